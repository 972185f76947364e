import type { HeldDirections } from 'input/contracts';
import type { Rectangle, Size } from 'types';
import { clampRectangleX, rectangleFromMidBottom } from 'util/geometry';
import { createTimedOverlay } from 'util/timed-overlay';

export type ActorPose = 'normal' | 'reacting';

export interface Actor {
    readonly speed: number;
    bounds(): Rectangle;
    /** Apply held directions, clamp to the field, and resolve the pose for `now`. */
    update(held: HeldDirections, now: number): ActorPose;
    /** Show the reacting pose until `now + reactionDurationMs`. Re-triggering restarts the window. */
    triggerReaction(now: number): void;
    poseAt(now: number): ActorPose;
    reactionExpiresAt(): number | null;
}

export interface ActorOptions {
    readonly playfield: Size;
    readonly size: Size;
    readonly speed: number;
    readonly bottomMargin: number;
    readonly reactionDurationMs: number;
}

export const createActor = ({ playfield, size, speed, bottomMargin, reactionDurationMs }: ActorOptions): Actor => {
    let rect = clampRectangleX(
        rectangleFromMidBottom(
            { x: Math.floor(playfield.width / 2), y: playfield.height - bottomMargin },
            size.width,
            size.height,
        ),
        playfield.width,
    );
    const reaction = createTimedOverlay({ durationMs: reactionDurationMs });

    const poseAt = (now: number): ActorPose => (reaction.isActive(now) ? 'reacting' : 'normal');

    const update = (held: HeldDirections, now: number): ActorPose => {
        let x = rect.x;
        if (held.left) {
            x -= speed;
        }
        if (held.right) {
            x += speed;
        }
        rect = clampRectangleX({ ...rect, x }, playfield.width);
        return poseAt(now);
    };

    return {
        speed,
        bounds: () => rect,
        update,
        triggerReaction: (now) => reaction.trigger(now),
        poseAt,
        reactionExpiresAt: () => reaction.expiresAt(),
    };
};
