import type { FallingItem, MissedSignal } from 'game/falling-item';
import type { TransientMessage } from 'game/transient-message';

export type GamePhase = 'playing' | 'ended' | 'final';

/**
 * Everything the frame loop owns for one session. Components receive it explicitly; nothing else
 * holds a reference.
 */
export interface GameSessionState<TImage> {
    phase: GamePhase;
    score: number;
    items: FallingItem[];
    messages: TransientMessage<TImage>[];
    /** Missed signals raised this frame, in emission order. */
    missedOutbox: MissedSignal[];
    caught: number;
    missed: number;
    spawned: number;
    frame: number;
    terminated: boolean;
}

export interface GameSessionSnapshot {
    readonly phase: GamePhase;
    readonly score: number;
    readonly activeItems: number;
    readonly activeMessages: number;
    readonly caught: number;
    readonly missed: number;
    readonly spawned: number;
    readonly frame: number;
    readonly terminated: boolean;
}

export const createSessionState = <TImage>(): GameSessionState<TImage> => ({
    phase: 'playing',
    score: 0,
    items: [],
    messages: [],
    missedOutbox: [],
    caught: 0,
    missed: 0,
    spawned: 0,
    frame: 0,
    terminated: false,
});

/**
 * Add captures to the score. Ignored outside the playing phase.
 */
export const recordCaptures = <TImage>(state: GameSessionState<TImage>, count: number): number => {
    if (state.phase !== 'playing' || count <= 0) {
        return state.score;
    }
    state.score += count;
    state.caught += count;
    return state.score;
};

export const pruneRemovedItems = <TImage>(state: GameSessionState<TImage>): void => {
    state.items = state.items.filter((item) => !item.isRemoved());
};

export const drainMissedOutbox = <TImage>(state: GameSessionState<TImage>): MissedSignal[] => {
    const drained = state.missedOutbox;
    state.missedOutbox = [];
    return drained;
};

export const clearActiveSets = <TImage>(state: GameSessionState<TImage>): void => {
    state.items = [];
    state.messages = [];
    state.missedOutbox = [];
};

export const snapshotSession = <TImage>(state: GameSessionState<TImage>): GameSessionSnapshot => ({
    phase: state.phase,
    score: state.score,
    activeItems: state.items.length,
    activeMessages: state.messages.length,
    caught: state.caught,
    missed: state.missed,
    spawned: state.spawned,
    frame: state.frame,
    terminated: state.terminated,
});
