import type { GamePhase, GameSessionState } from './state';
import type { Logger } from 'util/log';

/**
 * Which subsystems run during a phase.
 */
export interface PhaseSubsystems {
    readonly spawning: boolean;
    readonly collisions: boolean;
    readonly actorControl: boolean;
    readonly missedMessages: boolean;
}

export const PHASE_SUBSYSTEMS: Readonly<Record<GamePhase, PhaseSubsystems>> = {
    playing: { spawning: true, collisions: true, actorControl: true, missedMessages: true },
    ended: { spawning: false, collisions: false, actorControl: false, missedMessages: false },
    final: { spawning: false, collisions: false, actorControl: false, missedMessages: false },
};

const NEXT_PHASE: Readonly<Record<GamePhase, GamePhase | null>> = {
    playing: 'ended',
    ended: 'final',
    final: null,
};

/**
 * Phases only ever advance one step: playing → ended → final.
 */
export const canTransition = (from: GamePhase, to: GamePhase): boolean => NEXT_PHASE[from] === to;

export interface PhaseTransitionHooks {
    readonly logger?: Logger;
    readonly onChange?: (from: GamePhase, to: GamePhase) => void;
}

/**
 * Move the session to `to`. Refused (and logged) when it is not the next phase or the session has
 * already terminated.
 */
export const transitionPhase = <TImage>(
    state: GameSessionState<TImage>,
    to: GamePhase,
    hooks: PhaseTransitionHooks = {},
): boolean => {
    const from = state.phase;
    if (state.terminated || !canTransition(from, to)) {
        hooks.logger?.warn('phase transition refused', { from, to, terminated: state.terminated });
        return false;
    }

    state.phase = to;
    hooks.logger?.info('phase changed', { from, to, score: state.score });
    hooks.onChange?.(from, to);
    return true;
};
