import { describe, expect, it, vi } from 'vitest';
import { createEventBus } from 'app/events';
import { createGameRuntime, type GameAssets, type GameRuntime } from 'app/game-runtime';
import { headlessTextRenderer } from 'app/headless';
import { createGameConfig, type GameConfigOverrides } from 'config/game';
import { IDLE_INPUT, type FrameInput, type InputEvent } from 'input/contracts';
import { createLogger, silentLogWriter } from 'util/log';
import { createRandomManager } from 'util/random';

const assets: GameAssets<string> = {
    actor: { normal: 'actor', reacting: 'actor-reacting' },
    item: 'item',
    endAnimation: [{ image: 'ending', width: 200, height: 200 }],
    finalAnimation: [{ image: 'final', width: 200, height: 200 }],
};

/**
 * Every random draw returns `value`: 0.5 drops items at x=275 (over the actor), 0 at x=0.
 */
const createRuntime = (value: number, overrides: GameConfigOverrides = {}) => {
    const events = createEventBus({ now: () => 0 });
    const runtime = createGameRuntime({
        assets,
        text: headlessTextRenderer,
        config: createGameConfig({ items: { minSpeed: 50, maxSpeed: 50 }, ...overrides }),
        random: createRandomManager(1, { source: () => value }),
        logger: createLogger('test', { writer: silentLogWriter }),
        eventBus: events,
    });
    return { runtime, events };
};

const withEvents = (...events: InputEvent[]): FrameInput => ({ ...IDLE_INPUT, events });

const stepThrough = (runtime: GameRuntime<string>, from: number, to: number): void => {
    for (let now = from; now <= to; now += 1) {
        runtime.step(IDLE_INPUT, now);
    }
};

/** One item spawned at 1000 and caught at 1014 wins a one-point game. */
const reachEnded = () => {
    const setup = createRuntime(0.5, { scoring: { winThreshold: 1 } });
    stepThrough(setup.runtime, 0, 0);
    stepThrough(setup.runtime, 1000, 1014);
    return setup;
};

describe('createGameRuntime', () => {
    it('spawns an item once per interval after arming on the first step', () => {
        const { runtime, events } = createRuntime(0.5);
        const spawned = vi.fn();
        events.subscribe('ItemSpawned', spawned);

        runtime.step(IDLE_INPUT, 0);
        runtime.step(IDLE_INPUT, 999);
        expect(spawned).not.toHaveBeenCalled();

        runtime.step(IDLE_INPUT, 1000);
        expect(spawned).toHaveBeenCalledTimes(1);
        expect(spawned.mock.calls[0][0].payload).toEqual({ itemId: 1, x: 275, speed: 50 });
        expect(runtime.itemBounds()).toEqual([{ x: 275, y: 0, width: 50, height: 50 }]);
    });

    it('moves the actor while playing', () => {
        const { runtime } = createRuntime(0.5);

        runtime.step({ held: { left: true, right: false }, events: [] }, 0);
        runtime.step({ held: { left: true, right: true }, events: [] }, 1);

        expect(runtime.actorBounds()).toEqual({ x: 253, y: 700, width: 80, height: 80 });
    });

    it('reacts to a near item before catching it', () => {
        const { runtime, events } = createRuntime(0.5, { scoring: { winThreshold: 5 } });
        const reactions = vi.fn();
        const catches = vi.fn();
        events.subscribe('ReactionTriggered', reactions);
        events.subscribe('ItemCaught', catches);

        runtime.step(IDLE_INPUT, 0);
        stepThrough(runtime, 1000, 1013);
        expect(reactions).toHaveBeenCalledTimes(1);
        expect(reactions.mock.calls[0][0].payload).toEqual({ itemId: 1, expiresAt: 2013 });
        expect(catches).not.toHaveBeenCalled();
        expect(runtime.render(1013)[0].image).toBe('actor-reacting');

        runtime.step(IDLE_INPUT, 1014);
        expect(catches.mock.calls[0][0].payload).toEqual({ itemId: 1, score: 1 });
        expect(runtime.snapshot()).toMatchObject({ score: 1, caught: 1, activeItems: 0 });
    });

    it('turns a missed item into a fading message near the bottom edge', () => {
        const { runtime, events } = createRuntime(0);
        const missed = vi.fn();
        events.subscribe('ItemMissed', missed);

        runtime.step(IDLE_INPUT, 0);
        stepThrough(runtime, 1000, 1016);
        expect(missed).not.toHaveBeenCalled();

        runtime.step(IDLE_INPUT, 1017);
        expect(missed.mock.calls[0][0].payload).toEqual({ itemId: 1, position: { x: 25, y: 875 } });
        expect(runtime.snapshot()).toMatchObject({ missed: 1, activeItems: 0, activeMessages: 1, score: 0 });
        expect(runtime.render(1017)).toEqual([
            { image: 'actor', destination: { x: 260, y: 700, width: 80, height: 80 }, opacity: 255 },
            { image: 'you hate me :(', destination: { x: -31, y: 742, width: 112, height: 16 }, opacity: 255 },
            { image: 'Score: 0', destination: { x: 10, y: 10, width: 96, height: 24 }, opacity: 255 },
        ]);

        runtime.step(IDLE_INPUT, 1517);
        expect(runtime.render(1517)[1]).toEqual({
            image: 'you hate me :(',
            destination: { x: -31, y: 727, width: 112, height: 16 },
            opacity: 128,
        });

        runtime.step(IDLE_INPUT, 2017);
        expect(runtime.snapshot().activeMessages).toBe(0);
    });

    it('ends the game exactly once when the score reaches the threshold', () => {
        const { runtime, events } = createRuntime(0.5, { spawn: { intervalMs: 10 } });
        const phaseChanges = vi.fn();
        events.subscribe('PhaseChanged', phaseChanges);

        for (let step = 1; step <= 39; step += 1) {
            runtime.step(IDLE_INPUT, step * 10);
        }
        expect(runtime.snapshot()).toMatchObject({ phase: 'playing', score: 24 });

        runtime.step(IDLE_INPUT, 400);
        expect(runtime.snapshot()).toMatchObject({
            phase: 'ended',
            score: 25,
            caught: 25,
            spawned: 39,
            activeItems: 0,
            activeMessages: 0,
        });
        expect(phaseChanges).toHaveBeenCalledTimes(1);
        expect(phaseChanges.mock.calls[0][0]).toEqual({
            type: 'PhaseChanged',
            payload: { from: 'playing', to: 'ended', score: 25 },
            timestamp: 400,
        });

        for (let step = 41; step <= 200; step += 1) {
            runtime.step({ held: { left: true, right: false }, events: [] }, step * 10);
        }
        expect(runtime.snapshot()).toMatchObject({ phase: 'ended', score: 25, spawned: 39, activeItems: 0 });
        expect(runtime.actorBounds().x).toBe(260);
        expect(phaseChanges).toHaveBeenCalledTimes(1);
    });

    it('lays out the ended screen with the final score and a continue control', () => {
        const { runtime } = reachEnded();

        expect(runtime.render(2000)).toEqual([
            { image: 'ending', destination: { x: 200, y: 150, width: 200, height: 200 }, opacity: 255 },
            { image: 'Game Over! You Win!', destination: { x: 186, y: 388, width: 228, height: 24 }, opacity: 255 },
            { image: 'Final Score: 1', destination: { x: 216, y: 428, width: 168, height: 24 }, opacity: 255 },
            { image: 'Continue', destination: { x: 268, y: 472, width: 64, height: 16 }, opacity: 255 },
        ]);
        expect(runtime.continueControlBounds()).toEqual({ x: 268, y: 472, width: 64, height: 16 });
    });

    it('advances to the final screen only when the continue control is clicked', () => {
        const { runtime, events } = reachEnded();
        const phaseChanges = vi.fn();
        events.subscribe('PhaseChanged', phaseChanges);

        runtime.step(withEvents({ type: 'pointer-down', position: { x: 10, y: 10 } }), 1015);
        runtime.step(withEvents({ type: 'keypress', key: 'Enter' }), 1016);
        expect(runtime.snapshot().phase).toBe('ended');

        runtime.step(withEvents({ type: 'pointer-down', position: { x: 300, y: 480 } }), 1017);
        expect(runtime.snapshot().phase).toBe('final');
        expect(phaseChanges.mock.calls[0][0].payload).toEqual({ from: 'ended', to: 'final', score: 1 });
        expect(runtime.render(1017)).toEqual([
            { image: 'final', destination: { x: 200, y: 150, width: 200, height: 200 }, opacity: 255 },
            { image: 'Thank you for playing!', destination: { x: 168, y: 388, width: 264, height: 24 }, opacity: 255 },
            { image: 'Press any key to exit', destination: { x: 216, y: 432, width: 168, height: 16 }, opacity: 255 },
        ]);
    });

    it('terminates on a keypress in the final phase', () => {
        const { runtime, events } = reachEnded();
        const quits = vi.fn();
        events.subscribe('SessionQuit', quits);
        runtime.step(withEvents({ type: 'pointer-down', position: { x: 300, y: 480 } }), 1015);

        const result = runtime.step(withEvents({ type: 'keypress', key: 'q' }), 1016);

        expect(result).toEqual({ phase: 'final', terminated: true });
        expect(quits.mock.calls[0][0].payload).toEqual({ phase: 'final', score: 1, reason: 'keypress' });
    });

    it('terminates on a quit event in any phase and then ignores further steps', () => {
        const playing = createRuntime(0.5).runtime;
        expect(playing.step(withEvents({ type: 'quit' }), 0)).toEqual({ phase: 'playing', terminated: true });

        const { runtime, events } = reachEnded();
        const quits = vi.fn();
        events.subscribe('SessionQuit', quits);
        const frame = runtime.snapshot().frame;

        expect(runtime.step(withEvents({ type: 'quit' }), 1015)).toEqual({ phase: 'ended', terminated: true });
        runtime.step(withEvents({ type: 'pointer-down', position: { x: 300, y: 480 } }), 1016);

        expect(quits.mock.calls[0][0].payload.reason).toBe('quit-event');
        expect(runtime.snapshot()).toMatchObject({ phase: 'ended', terminated: true, frame: frame + 1 });
    });
});
