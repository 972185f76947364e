import type { Glyph } from 'render/contracts';
import { FULL_OPACITY } from 'render/contracts';
import type { Rectangle, Vector2 } from 'types';
import { rectangleCenteredAt } from 'util/geometry';
import { createTimedOverlay } from 'util/timed-overlay';

export const DEFAULT_MESSAGE_DURATION_MS = 1000;
export const DEFAULT_DRIFT_DISTANCE = 30;

/**
 * Short-lived text that fades out while drifting upward from its anchor.
 */
export interface TransientMessage<TImage> {
    readonly text: string;
    readonly glyph: Glyph<TImage>;
    readonly anchor: Vector2;
    readonly createdAt: number;
    readonly durationMs: number;
    /** Recompute opacity and position for `now`. */
    update(now: number): void;
    /** 0–255, as of the last update. */
    opacity(): number;
    /** Center of the text, as of the last update. */
    position(): Vector2;
    bounds(): Rectangle;
    isDead(): boolean;
}

export interface TransientMessageOptions<TImage> {
    readonly text: string;
    readonly glyph: Glyph<TImage>;
    readonly anchor: Vector2;
    readonly createdAt: number;
    readonly durationMs?: number;
    readonly driftDistance?: number;
}

export const createTransientMessage = <TImage>({
    text,
    glyph,
    anchor,
    createdAt,
    durationMs = DEFAULT_MESSAGE_DURATION_MS,
    driftDistance = DEFAULT_DRIFT_DISTANCE,
}: TransientMessageOptions<TImage>): TransientMessage<TImage> => {
    const fade = createTimedOverlay({ durationMs, startedAt: createdAt });
    let opacity: number = FULL_OPACITY;
    let position: Vector2 = anchor;

    const update = (now: number): void => {
        const progress = fade.progress(now);
        opacity = progress >= 1 ? 0 : Math.ceil(FULL_OPACITY * (1 - progress));
        position = { x: anchor.x, y: anchor.y - Math.floor(progress * driftDistance) };
    };

    update(createdAt);

    return {
        text,
        glyph,
        anchor,
        createdAt,
        durationMs: fade.durationMs,
        update,
        opacity: () => opacity,
        position: () => position,
        bounds: () => rectangleCenteredAt(position, glyph.width, glyph.height),
        isDead: () => opacity <= 0,
    };
};
