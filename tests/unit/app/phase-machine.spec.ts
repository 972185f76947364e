import { describe, expect, it, vi } from 'vitest';
import { canTransition, PHASE_SUBSYSTEMS, transitionPhase } from 'app/phase-machine';
import { createSessionState } from 'app/state';
import { createLogger, type LogEntry } from 'util/log';

const captureLogger = () => {
    const entries: LogEntry[] = [];
    const logger = createLogger('phase', { writer: (entry) => entries.push(entry), now: () => 0 });
    return { entries, logger };
};

describe('phase machine', () => {
    it('only allows advancing to the next phase', () => {
        expect(canTransition('playing', 'ended')).toBe(true);
        expect(canTransition('ended', 'final')).toBe(true);
        expect(canTransition('playing', 'final')).toBe(false);
        expect(canTransition('ended', 'playing')).toBe(false);
        expect(canTransition('final', 'playing')).toBe(false);
        expect(canTransition('final', 'final')).toBe(false);
    });

    it('runs the gameplay subsystems only while playing', () => {
        expect(PHASE_SUBSYSTEMS.playing).toEqual({
            spawning: true,
            collisions: true,
            actorControl: true,
            missedMessages: true,
        });
        expect(Object.values(PHASE_SUBSYSTEMS.ended).some(Boolean)).toBe(false);
        expect(Object.values(PHASE_SUBSYSTEMS.final).some(Boolean)).toBe(false);
    });

    it('moves the session forward and reports the change', () => {
        const state = createSessionState<string>();
        state.score = 25;
        const onChange = vi.fn();
        const { entries, logger } = captureLogger();

        expect(transitionPhase(state, 'ended', { logger, onChange })).toBe(true);

        expect(state.phase).toBe('ended');
        expect(onChange).toHaveBeenCalledWith('playing', 'ended');
        expect(entries.map((entry) => [entry.level, entry.message])).toEqual([['info', 'phase changed']]);
    });

    it('refuses a skipped phase and leaves the session untouched', () => {
        const state = createSessionState<string>();
        const onChange = vi.fn();
        const { entries, logger } = captureLogger();

        expect(transitionPhase(state, 'final', { logger, onChange })).toBe(false);

        expect(state.phase).toBe('playing');
        expect(onChange).not.toHaveBeenCalled();
        expect(entries[0]).toMatchObject({
            level: 'warn',
            message: 'phase transition refused',
            context: { from: 'playing', to: 'final', terminated: false },
        });
    });

    it('refuses any transition once the session has terminated', () => {
        const state = createSessionState<string>();
        state.terminated = true;

        expect(transitionPhase(state, 'ended')).toBe(false);
        expect(state.phase).toBe('playing');
    });
});
