import { createGameRuntime, type GameAssets, type GameRuntime } from './game-runtime';
import { DEFAULT_STEP_MS } from './loop';
import type { GamePhase } from './state';
import { createGameConfig, type GameConfigOverrides } from 'config/game';
import type { FrameInput, HeldDirections, InputEvent } from 'input/contracts';
import { NO_DIRECTIONS } from 'input/contracts';
import type { FontSize, TextRenderer } from 'render/contracts';
import type { Rectangle } from 'types';
import { rectangleCenter } from 'util/geometry';
import { createLogger, silentLogWriter, type Logger } from 'util/log';
import { createRandomManager } from 'util/random';

export interface HeadlessSessionOptions {
    readonly seed?: number;
    /** Simulated time budget. */
    readonly durationMs?: number;
    readonly config?: GameConfigOverrides;
    /** Click through the ended screen and press a key on the final one. Defaults to true. */
    readonly autoContinue?: boolean;
    readonly logger?: Logger;
}

export interface HeadlessSessionResult {
    readonly seed: number;
    readonly phase: GamePhase;
    readonly terminated: boolean;
    readonly score: number;
    readonly caught: number;
    readonly missed: number;
    readonly spawned: number;
    readonly frames: number;
    readonly durationMs: number;
    /** Simulated time at which the ended phase began, or `null`. */
    readonly endedAtMs: number | null;
}

const DEFAULT_SEED = 1;
const DEFAULT_DURATION_MS = 120_000;

const GLYPH_METRICS: Record<FontSize, { readonly charWidth: number; readonly height: number }> = {
    large: { charWidth: 12, height: 24 },
    small: { charWidth: 8, height: 16 },
};

/**
 * Text renderer that only measures; images are the text itself.
 */
export const headlessTextRenderer: TextRenderer<string> = {
    render: (text, font) => ({
        image: text,
        width: text.length * GLYPH_METRICS[font].charWidth,
        height: GLYPH_METRICS[font].height,
    }),
};

const headlessAssets: GameAssets<string> = {
    actor: { normal: 'actor', reacting: 'actor-reacting' },
    item: 'item',
    endAnimation: [{ image: 'ending', width: 200, height: 200 }],
    finalAnimation: [{ image: 'final', width: 200, height: 200 }],
};

/**
 * Steer under the lowest item on the field.
 */
export const autopilot = (runtime: GameRuntime<string>): HeldDirections => {
    const target = runtime
        .itemBounds()
        .reduce<Rectangle | null>(
            (lowest, bounds) => (lowest === null || bounds.y > lowest.y ? bounds : lowest),
            null,
        );
    if (!target) {
        return NO_DIRECTIONS;
    }

    const actorX = rectangleCenter(runtime.actorBounds()).x;
    const targetX = rectangleCenter(target).x;
    const tolerance = runtime.config.actor.speed / 2;
    return {
        left: targetX < actorX - tolerance,
        right: targetX > actorX + tolerance,
    };
};

const continueEvents = (runtime: GameRuntime<string>, phase: GamePhase): InputEvent[] => {
    if (phase === 'ended') {
        return [{ type: 'pointer-down', position: rectangleCenter(runtime.continueControlBounds()) }];
    }
    if (phase === 'final') {
        return [{ type: 'keypress', key: 'Enter' }];
    }
    return [];
};

export const runHeadlessSession = (options: HeadlessSessionOptions = {}): HeadlessSessionResult => {
    const seed = options.seed ?? DEFAULT_SEED;
    const durationMs = Math.max(0, options.durationMs ?? DEFAULT_DURATION_MS);
    const autoContinue = options.autoContinue ?? true;
    const logger = options.logger ?? createLogger('headless', { writer: silentLogWriter });
    const config = createGameConfig(options.config);
    const stepMs = config.loop.fixedDelta > 0 ? config.loop.fixedDelta * 1000 : DEFAULT_STEP_MS;

    const runtime = createGameRuntime({
        assets: headlessAssets,
        text: headlessTextRenderer,
        config,
        random: createRandomManager(seed),
        logger,
    });

    let endedAtMs: number | null = null;
    runtime.events.subscribeOnce('PhaseChanged', (event) => {
        endedAtMs = event.timestamp;
    });

    let now = 0;
    let phase: GamePhase = 'playing';
    let terminated = false;
    while (!terminated && now + stepMs <= durationMs) {
        now += stepMs;
        const input: FrameInput = {
            held: phase === 'playing' ? autopilot(runtime) : NO_DIRECTIONS,
            events: autoContinue ? continueEvents(runtime, phase) : [],
        };
        const result = runtime.step(input, now);
        phase = result.phase;
        terminated = result.terminated;
    }

    const snapshot = runtime.snapshot();
    logger.info('headless session finished', { seed, score: snapshot.score, phase: snapshot.phase });
    return {
        seed,
        phase: snapshot.phase,
        terminated: snapshot.terminated,
        score: snapshot.score,
        caught: snapshot.caught,
        missed: snapshot.missed,
        spawned: snapshot.spawned,
        frames: snapshot.frame,
        durationMs: now,
        endedAtMs,
    };
};
