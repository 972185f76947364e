import type { Rectangle } from 'types';
import { inflateRectangle, rectanglesIntersect } from 'util/geometry';
import type { Actor } from './actor';
import type { FallingItem } from './falling-item';

/**
 * First item close enough to the actor to count as soft contact, or `null`.
 */
export const findSoftContact = (
    actorBounds: Rectangle,
    items: readonly FallingItem[],
    margin: number,
): FallingItem | null =>
    items.find((item) => !item.isRemoved() && rectanglesIntersect(actorBounds, inflateRectangle(item.bounds(), margin))) ??
    null;

/**
 * Every item whose exact bounds overlap the actor's.
 */
export const findCaptures = (actorBounds: Rectangle, items: readonly FallingItem[]): FallingItem[] =>
    items.filter((item) => !item.isRemoved() && rectanglesIntersect(actorBounds, item.bounds()));

export interface CollisionPassOptions {
    readonly actor: Actor;
    readonly items: readonly FallingItem[];
    readonly contactMargin: number;
    readonly now: number;
}

export interface CollisionPassResult {
    /** Item that triggered this frame's reaction. */
    readonly contact: FallingItem | null;
    /** Items caught this frame, already marked. */
    readonly captured: readonly FallingItem[];
}

/**
 * Soft contact triggers at most one reaction per frame; hard capture is tested independently and
 * marks every overlapping item as caught.
 */
export const runCollisionPass = ({ actor, items, contactMargin, now }: CollisionPassOptions): CollisionPassResult => {
    const bounds = actor.bounds();
    const contact = findSoftContact(bounds, items, contactMargin);
    if (contact) {
        actor.triggerReaction(now);
    }

    const captured = findCaptures(bounds, items);
    for (const item of captured) {
        item.markCaught();
    }

    return { contact, captured };
};
