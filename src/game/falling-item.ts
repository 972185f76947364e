import type { Rectangle, Size, Vector2 } from 'types';
import { createRectangle, rectangleCenter } from 'util/geometry';
import type { RandomManager } from 'util/random';

/**
 * Raised once when an item leaves through the bottom of the field.
 */
export interface MissedSignal {
    readonly itemId: number;
    readonly position: Vector2;
}

export type FallingItemState = 'falling' | 'caught' | 'missed';

export interface FallingItem {
    readonly id: number;
    /** Pixels per step, fixed for the item's lifetime. */
    readonly speed: number;
    bounds(): Rectangle;
    state(): FallingItemState;
    isRemoved(): boolean;
    /**
     * Advance one step. Returns the missed signal on the step the item leaves the field and `null`
     * otherwise, including every step after removal.
     */
    update(): MissedSignal | null;
    markCaught(): void;
}

export interface FallingItemOptions {
    readonly id: number;
    readonly playfield: Size;
    readonly size: Size;
    readonly minSpeed: number;
    readonly maxSpeed: number;
    readonly random: RandomManager;
}

export const createFallingItem = ({ id, playfield, size, minSpeed, maxSpeed, random }: FallingItemOptions): FallingItem => {
    const x = random.intInRange(0, playfield.width - size.width);
    const speed = random.intInRange(minSpeed, maxSpeed);
    let rect: Rectangle = createRectangle(x, -size.height, size.width, size.height);
    let state: FallingItemState = 'falling';

    const update = (): MissedSignal | null => {
        if (state !== 'falling') {
            return null;
        }

        rect = { ...rect, y: rect.y + speed };
        if (rect.y <= playfield.height) {
            return null;
        }

        state = 'missed';
        return { itemId: id, position: rectangleCenter(rect) };
    };

    return {
        id,
        speed,
        bounds: () => rect,
        state: () => state,
        isRemoved: () => state !== 'falling',
        update,
        markCaught: () => {
            if (state === 'falling') {
                state = 'caught';
            }
        },
    };
};
