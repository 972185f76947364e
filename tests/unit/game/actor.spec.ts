import { describe, expect, it } from 'vitest';
import { createActor, type ActorOptions } from 'game/actor';

const options: ActorOptions = {
    playfield: { width: 600, height: 800 },
    size: { width: 80, height: 80 },
    speed: 7,
    bottomMargin: 20,
    reactionDurationMs: 1000,
};

const LEFT = { left: true, right: false };
const RIGHT = { left: false, right: true };
const BOTH = { left: true, right: true };
const NONE = { left: false, right: false };

describe('createActor', () => {
    it('starts centered at the bottom of the field', () => {
        expect(createActor(options).bounds()).toEqual({ x: 260, y: 700, width: 80, height: 80 });
    });

    it('moves by its speed for each held direction', () => {
        const actor = createActor(options);
        actor.update(LEFT, 0);
        expect(actor.bounds().x).toBe(253);
        actor.update(RIGHT, 0);
        actor.update(RIGHT, 0);
        expect(actor.bounds().x).toBe(267);
        actor.update(BOTH, 0);
        expect(actor.bounds().x).toBe(267);
        actor.update(NONE, 0);
        expect(actor.bounds().x).toBe(267);
    });

    it('never leaves the field whatever is held', () => {
        const actor = createActor(options);
        const sequence = [...Array<typeof LEFT>(60).fill(LEFT), ...Array<typeof RIGHT>(120).fill(RIGHT), BOTH, NONE];
        for (const held of sequence) {
            actor.update(held, 0);
            const { x, width } = actor.bounds();
            expect(x).toBeGreaterThanOrEqual(0);
            expect(x + width).toBeLessThanOrEqual(600);
        }
        expect(actor.bounds().x).toBe(520);
    });

    it('clamps flush against the left edge', () => {
        const actor = createActor(options);
        for (let index = 0; index < 40; index += 1) {
            actor.update(LEFT, 0);
        }
        expect(actor.bounds().x).toBe(0);
    });

    it('shows the reacting pose until the reaction window closes', () => {
        const actor = createActor(options);
        expect(actor.poseAt(0)).toBe('normal');
        actor.triggerReaction(100);
        expect(actor.reactionExpiresAt()).toBe(1100);
        expect(actor.update(NONE, 500)).toBe('reacting');
        expect(actor.poseAt(1099)).toBe('reacting');
        expect(actor.poseAt(1100)).toBe('normal');
    });

    it('extends the reaction from the latest trigger without stacking', () => {
        const actor = createActor(options);
        actor.triggerReaction(0);
        actor.triggerReaction(600);
        expect(actor.reactionExpiresAt()).toBe(1600);
        expect(actor.poseAt(1500)).toBe('reacting');
        expect(actor.poseAt(1600)).toBe('normal');
    });
});
