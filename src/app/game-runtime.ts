import { createEventBus, type CatcherEventBus, type SessionQuitReason } from './events';
import { PHASE_SUBSYSTEMS, transitionPhase } from './phase-machine';
import {
    clearActiveSets,
    createSessionState,
    drainMissedOutbox,
    pruneRemovedItems,
    recordCaptures,
    snapshotSession,
    type GamePhase,
    type GameSessionSnapshot,
} from './state';
import { createGameConfig, type GameConfig } from 'config/game';
import { createActor } from 'game/actor';
import { runCollisionPass } from 'game/collisions';
import { createFallingItem } from 'game/falling-item';
import { createSpawnScheduler } from 'game/spawn-scheduler';
import { createTransientMessage } from 'game/transient-message';
import type { FrameInput, InputEvent } from 'input/contracts';
import { createAnimationPlayer } from 'render/animation-player';
import type { AnimationFrame, DrawCall, TextRenderer } from 'render/contracts';
import { createGlyphCache } from 'render/glyph-cache';
import { captionLineBounds, composeCaptionScreen, composePlayingScreen, type ActorImages } from 'render/screens';
import type { Rectangle } from 'types';
import { pointInRectangle } from 'util/geometry';
import { rootLogger, type Logger } from 'util/log';
import { createRandomManager, type RandomManager } from 'util/random';

/**
 * Decoded, already-scaled images supplied by the asset loader.
 */
export interface GameAssets<TImage> {
    readonly actor: ActorImages<TImage>;
    readonly item: TImage;
    /** Shown on the ended screen. A still image is a one-frame sequence. */
    readonly endAnimation: readonly AnimationFrame<TImage>[];
    readonly finalAnimation: readonly AnimationFrame<TImage>[];
}

export interface GameRuntimeOptions<TImage> {
    readonly assets: GameAssets<TImage>;
    readonly text: TextRenderer<TImage>;
    readonly config?: GameConfig;
    readonly random?: RandomManager;
    readonly logger?: Logger;
    readonly eventBus?: CatcherEventBus;
    /** Anchor for both end-screen animations. */
    readonly startedAt?: number;
}

export interface StepResult {
    readonly phase: GamePhase;
    readonly terminated: boolean;
}

export interface GameRuntime<TImage> {
    readonly config: GameConfig;
    readonly events: CatcherEventBus;
    /** Advance one fixed step at absolute time `now` (ms). */
    step(input: FrameInput, now: number): StepResult;
    /** Draw list for `now`, in blit order. */
    render(now: number): DrawCall<TImage>[];
    snapshot(): GameSessionSnapshot;
    actorBounds(): Rectangle;
    itemBounds(): Rectangle[];
    /** Clickable area that advances the ended screen. */
    continueControlBounds(): Rectangle;
}

const CONTINUE_LINE_INDEX = 2;

export const createGameRuntime = <TImage>({
    assets,
    text,
    config = createGameConfig(),
    random = createRandomManager(),
    logger = rootLogger,
    eventBus,
    startedAt = 0,
}: GameRuntimeOptions<TImage>): GameRuntime<TImage> => {
    const log = logger.child('runtime');
    const events = eventBus ?? createEventBus({ logger });
    const glyphs = createGlyphCache(text);
    const state = createSessionState<TImage>();
    const scheduler = createSpawnScheduler(config.spawn.intervalMs);
    const endAnimation = createAnimationPlayer(assets.endAnimation, startedAt);
    const finalAnimation = createAnimationPlayer(assets.finalAnimation, startedAt);
    const actor = createActor({
        playfield: config.playfield,
        size: config.actor.size,
        speed: config.actor.speed,
        bottomMargin: config.actor.bottomMargin,
        reactionDurationMs: config.actor.reactionDurationMs,
    });
    let nextItemId = 1;

    const endedLines = () => {
        const screen = config.screens.ended;
        return [
            glyphs.render(screen.title, 'large'),
            glyphs.render(`${screen.finalScoreLabel}${state.score}`, 'large'),
            glyphs.render(screen.continueLabel, 'small'),
        ];
    };

    const continueControlBounds = (): Rectangle =>
        captionLineBounds(
            config.playfield,
            endedLines()[CONTINUE_LINE_INDEX],
            CONTINUE_LINE_INDEX,
            config.screens.ended.lineSpacing,
        );

    const advance = (to: GamePhase, now: number): boolean => {
        const from = state.phase;
        return transitionPhase(state, to, {
            logger: log,
            onChange: () => events.publish('PhaseChanged', { from, to, score: state.score }, now),
        });
    };

    const terminate = (reason: SessionQuitReason, now: number): void => {
        if (state.terminated) {
            return;
        }
        state.terminated = true;
        log.info('session terminated', { reason, phase: state.phase, score: state.score });
        events.publish('SessionQuit', { phase: state.phase, score: state.score, reason }, now);
    };

    const handleEvent = (event: InputEvent, now: number): void => {
        if (event.type === 'quit') {
            terminate('quit-event', now);
            return;
        }

        switch (state.phase) {
            case 'ended':
                if (event.type === 'pointer-down' && pointInRectangle(event.position, continueControlBounds())) {
                    advance('final', now);
                }
                return;
            case 'final':
                if (event.type === 'keypress') {
                    terminate('keypress', now);
                }
                return;
            case 'playing':
                return;
        }
    };

    const spawnItems = (count: number, now: number): void => {
        for (let index = 0; index < count; index += 1) {
            const item = createFallingItem({
                id: nextItemId,
                playfield: config.playfield,
                size: config.items.size,
                minSpeed: config.items.minSpeed,
                maxSpeed: config.items.maxSpeed,
                random,
            });
            nextItemId += 1;
            state.items.push(item);
            state.spawned += 1;
            events.publish('ItemSpawned', { itemId: item.id, x: item.bounds().x, speed: item.speed }, now);
        }
    };

    const updateItems = (): void => {
        for (const item of state.items) {
            const signal = item.update();
            if (signal) {
                state.missedOutbox.push(signal);
            }
        }
    };

    const resolveCollisions = (now: number): void => {
        const { contact, captured } = runCollisionPass({
            actor,
            items: state.items,
            contactMargin: config.contact.margin,
            now,
        });

        const expiresAt = actor.reactionExpiresAt();
        if (contact && expiresAt !== null) {
            events.publish('ReactionTriggered', { itemId: contact.id, expiresAt }, now);
        }

        if (captured.length > 0) {
            const score = recordCaptures(state, captured.length);
            log.debug('items caught', { count: captured.length, score });
            for (const item of captured) {
                events.publish('ItemCaught', { itemId: item.id, score }, now);
            }
        }
    };

    const convertMissedSignals = (now: number): void => {
        const { messages } = config;
        for (const signal of drainMissedOutbox(state)) {
            state.missed += 1;
            const anchor = {
                x: signal.position.x,
                y: Math.min(signal.position.y, config.playfield.height - messages.bottomInset),
            };
            state.messages.push(
                createTransientMessage({
                    text: messages.missedText,
                    glyph: glyphs.render(messages.missedText, 'small'),
                    anchor,
                    createdAt: now,
                    durationMs: messages.durationMs,
                    driftDistance: messages.driftDistance,
                }),
            );
            log.debug('item missed', { itemId: signal.itemId, x: signal.position.x });
            events.publish('ItemMissed', { itemId: signal.itemId, position: signal.position }, now);
        }
    };

    const checkWin = (now: number): void => {
        if (state.score < config.scoring.winThreshold) {
            return;
        }
        if (advance('ended', now)) {
            clearActiveSets(state);
        }
    };

    const updateMessages = (now: number): void => {
        for (const message of state.messages) {
            message.update(now);
        }
        state.messages = state.messages.filter((message) => !message.isDead());
    };

    const step = (input: FrameInput, now: number): StepResult => {
        if (state.terminated) {
            return { phase: state.phase, terminated: true };
        }

        state.frame += 1;
        for (const event of input.events) {
            handleEvent(event, now);
            if (state.terminated) {
                return { phase: state.phase, terminated: true };
            }
        }

        const subsystems = PHASE_SUBSYSTEMS[state.phase];
        spawnItems(scheduler.tick(now, subsystems.spawning), now);

        if (subsystems.actorControl) {
            actor.update(input.held, now);
        }

        if (subsystems.collisions) {
            updateItems();
            resolveCollisions(now);
            pruneRemovedItems(state);
        }

        if (subsystems.missedMessages) {
            convertMissedSignals(now);
            checkWin(now);
        }

        updateMessages(now);
        return { phase: state.phase, terminated: false };
    };

    const render = (now: number): DrawCall<TImage>[] => {
        switch (state.phase) {
            case 'playing':
                return composePlayingScreen({
                    actor,
                    actorImages: assets.actor,
                    items: state.items,
                    itemImage: assets.item,
                    messages: state.messages,
                    scoreLabel: glyphs.render(`${config.scoring.label}${state.score}`, 'large'),
                    scorePosition: config.scoring.position,
                    now,
                });
            case 'ended':
                return composeCaptionScreen({
                    playfield: config.playfield,
                    animation: endAnimation,
                    animationOffsetY: config.screens.ended.animationOffsetY,
                    lines: endedLines(),
                    lineSpacing: config.screens.ended.lineSpacing,
                    now,
                });
            case 'final':
                return composeCaptionScreen({
                    playfield: config.playfield,
                    animation: finalAnimation,
                    animationOffsetY: config.screens.final.animationOffsetY,
                    lines: [
                        glyphs.render(config.screens.final.title, 'large'),
                        glyphs.render(config.screens.final.prompt, 'small'),
                    ],
                    lineSpacing: config.screens.final.lineSpacing,
                    now,
                });
        }
    };

    return {
        config,
        events,
        step,
        render,
        snapshot: () => snapshotSession(state),
        actorBounds: () => actor.bounds(),
        itemBounds: () => state.items.map((item) => item.bounds()),
        continueControlBounds,
    };
};
