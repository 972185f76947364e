import { describe, expect, it } from 'vitest';
import {
    clearActiveSets,
    createSessionState,
    drainMissedOutbox,
    pruneRemovedItems,
    recordCaptures,
    snapshotSession,
} from 'app/state';
import { createTransientMessage } from 'game/transient-message';
import { pinnedItem } from '../support/items';

describe('session state', () => {
    it('starts in the playing phase with nothing on the field', () => {
        expect(snapshotSession(createSessionState<string>())).toEqual({
            phase: 'playing',
            score: 0,
            activeItems: 0,
            activeMessages: 0,
            caught: 0,
            missed: 0,
            spawned: 0,
            frame: 0,
            terminated: false,
        });
    });

    it('adds captures to the score while playing', () => {
        const state = createSessionState<string>();

        expect(recordCaptures(state, 2)).toBe(2);
        expect(recordCaptures(state, 1)).toBe(3);
        expect(state.caught).toBe(3);
    });

    it('ignores captures outside the playing phase and non-positive counts', () => {
        const state = createSessionState<string>();
        recordCaptures(state, 0);
        recordCaptures(state, -2);
        state.phase = 'ended';
        recordCaptures(state, 4);

        expect(state.score).toBe(0);
        expect(state.caught).toBe(0);
    });

    it('prunes items that were caught or missed', () => {
        const state = createSessionState<string>();
        const kept = pinnedItem(1, { x: 0, y: 0, width: 50, height: 50 });
        const caught = pinnedItem(2, { x: 0, y: 0, width: 50, height: 50 });
        caught.markCaught();
        state.items = [kept, caught];

        pruneRemovedItems(state);

        expect(state.items).toEqual([kept]);
    });

    it('drains missed signals in emission order', () => {
        const state = createSessionState<string>();
        state.missedOutbox.push(
            { itemId: 1, position: { x: 25, y: 825 } },
            { itemId: 2, position: { x: 75, y: 826 } },
        );

        expect(drainMissedOutbox(state).map((signal) => signal.itemId)).toEqual([1, 2]);
        expect(drainMissedOutbox(state)).toEqual([]);
    });

    it('clears items, messages and pending signals together', () => {
        const state = createSessionState<string>();
        state.items = [pinnedItem(1, { x: 0, y: 0, width: 50, height: 50 })];
        state.messages = [
            createTransientMessage({
                text: 'missed',
                glyph: { image: 'missed', width: 10, height: 10 },
                anchor: { x: 0, y: 0 },
                createdAt: 0,
            }),
        ];
        state.missedOutbox = [{ itemId: 3, position: { x: 0, y: 0 } }];
        state.score = 7;

        clearActiveSets(state);

        expect(snapshotSession(state)).toMatchObject({ activeItems: 0, activeMessages: 0, score: 7 });
        expect(state.missedOutbox).toEqual([]);
    });
});
