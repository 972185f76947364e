import type { Size } from 'types';

interface LoopConfig {
    /** Simulation step in seconds. */
    readonly fixedDelta: number;
    readonly maxStepsPerFrame: number;
    readonly maxFrameDeltaMs: number;
}

interface ActorConfig {
    readonly size: Size;
    /** Pixels per step while a direction is held. */
    readonly speed: number;
    /** Gap between the actor's bottom edge and the play-field bottom. */
    readonly bottomMargin: number;
    readonly reactionDurationMs: number;
}

interface ItemConfig {
    readonly size: Size;
    /** Pixels per step, sampled once per item as an integer in [minSpeed, maxSpeed]. */
    readonly minSpeed: number;
    readonly maxSpeed: number;
}

interface MessageConfig {
    readonly missedText: string;
    readonly durationMs: number;
    readonly driftDistance: number;
    /** Missed messages are raised so their anchor stays at least this far above the bottom. */
    readonly bottomInset: number;
}

interface EndedScreenConfig {
    /** Vertical offset of the animation center from the field center. */
    readonly animationOffsetY: number;
    readonly title: string;
    readonly finalScoreLabel: string;
    readonly continueLabel: string;
    readonly lineSpacing: number;
}

interface FinalScreenConfig {
    readonly animationOffsetY: number;
    readonly title: string;
    readonly prompt: string;
    readonly lineSpacing: number;
}

export interface GameConfig {
    readonly playfield: Size;
    readonly loop: LoopConfig;
    readonly actor: ActorConfig;
    readonly items: ItemConfig;
    readonly spawn: {
        readonly intervalMs: number;
    };
    readonly contact: {
        /** Soft-contact inflation applied to every side of an item. */
        readonly margin: number;
    };
    readonly messages: MessageConfig;
    readonly scoring: {
        readonly label: string;
        readonly winThreshold: number;
        readonly position: { readonly x: number; readonly y: number };
    };
    readonly screens: {
        readonly ended: EndedScreenConfig;
        readonly final: FinalScreenConfig;
    };
}

/**
 * Gameplay constants. Tunable values belong here so they can be tweaked without hunting through the
 * simulation code.
 */
export const gameConfig = {
    playfield: { width: 600, height: 800 },
    loop: { fixedDelta: 1 / 60, maxStepsPerFrame: 5, maxFrameDeltaMs: 100 },
    actor: {
        size: { width: 80, height: 80 },
        speed: 7,
        bottomMargin: 20,
        reactionDurationMs: 1000,
    },
    items: {
        size: { width: 50, height: 50 },
        minSpeed: 3,
        maxSpeed: 7,
    },
    spawn: { intervalMs: 1000 },
    contact: { margin: 20 },
    messages: {
        missedText: 'you hate me :(',
        durationMs: 1000,
        driftDistance: 30,
        bottomInset: 50,
    },
    scoring: {
        label: 'Score: ',
        winThreshold: 25,
        position: { x: 10, y: 10 },
    },
    screens: {
        ended: {
            animationOffsetY: -150,
            title: 'Game Over! You Win!',
            finalScoreLabel: 'Final Score: ',
            continueLabel: 'Continue',
            lineSpacing: 40,
        },
        final: {
            animationOffsetY: -150,
            title: 'Thank you for playing!',
            prompt: 'Press any key to exit',
            lineSpacing: 40,
        },
    },
} as const satisfies GameConfig;

export type GameConfigOverrides = {
    readonly [Section in keyof GameConfig]?: Partial<GameConfig[Section]>;
};

const requirePositive = (key: string, value: number): void => {
    if (!Number.isFinite(value) || value <= 0) {
        throw new RangeError(`${key} must be a positive finite number (received ${value})`);
    }
};

const requireNonNegative = (key: string, value: number): void => {
    if (!Number.isFinite(value) || value < 0) {
        throw new RangeError(`${key} must be a non-negative finite number (received ${value})`);
    }
};

const requireInteger = (key: string, value: number): void => {
    if (!Number.isInteger(value)) {
        throw new RangeError(`${key} must be an integer (received ${value})`);
    }
};

const requireSize = (key: string, size: Size): void => {
    requirePositive(`${key}.width`, size.width);
    requirePositive(`${key}.height`, size.height);
};

export const validateGameConfig = (config: GameConfig): GameConfig => {
    requireSize('playfield', config.playfield);
    requirePositive('loop.fixedDelta', config.loop.fixedDelta);
    requirePositive('loop.maxStepsPerFrame', config.loop.maxStepsPerFrame);
    requirePositive('loop.maxFrameDeltaMs', config.loop.maxFrameDeltaMs);
    requireSize('actor.size', config.actor.size);
    requireNonNegative('actor.speed', config.actor.speed);
    requireNonNegative('actor.bottomMargin', config.actor.bottomMargin);
    requireNonNegative('actor.reactionDurationMs', config.actor.reactionDurationMs);
    requireSize('items.size', config.items.size);
    requirePositive('items.minSpeed', config.items.minSpeed);
    requirePositive('items.maxSpeed', config.items.maxSpeed);
    requireInteger('items.minSpeed', config.items.minSpeed);
    requireInteger('items.maxSpeed', config.items.maxSpeed);
    requirePositive('spawn.intervalMs', config.spawn.intervalMs);
    requireNonNegative('contact.margin', config.contact.margin);
    requireNonNegative('messages.durationMs', config.messages.durationMs);
    requireNonNegative('messages.driftDistance', config.messages.driftDistance);
    requireNonNegative('messages.bottomInset', config.messages.bottomInset);

    if (config.items.minSpeed > config.items.maxSpeed) {
        throw new RangeError('items.minSpeed must not exceed items.maxSpeed');
    }
    if (config.actor.size.width > config.playfield.width) {
        throw new RangeError('actor.size.width must fit within playfield.width');
    }
    if (config.items.size.width > config.playfield.width) {
        throw new RangeError('items.size.width must fit within playfield.width');
    }
    if (!Number.isInteger(config.scoring.winThreshold) || config.scoring.winThreshold < 1) {
        throw new RangeError(`scoring.winThreshold must be a positive integer (received ${config.scoring.winThreshold})`);
    }

    return config;
};

/**
 * Merge section-level overrides onto the defaults and validate the result.
 */
export const createGameConfig = (overrides: GameConfigOverrides = {}): GameConfig =>
    validateGameConfig({
        playfield: { ...gameConfig.playfield, ...overrides.playfield },
        loop: { ...gameConfig.loop, ...overrides.loop },
        actor: { ...gameConfig.actor, ...overrides.actor },
        items: { ...gameConfig.items, ...overrides.items },
        spawn: { ...gameConfig.spawn, ...overrides.spawn },
        contact: { ...gameConfig.contact, ...overrides.contact },
        messages: { ...gameConfig.messages, ...overrides.messages },
        scoring: { ...gameConfig.scoring, ...overrides.scoring },
        screens: { ...gameConfig.screens, ...overrides.screens },
    });
