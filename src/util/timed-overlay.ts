import { clamp } from './geometry';

/**
 * A time window anchored at its last trigger. Entities derive their presentation
 * (pose, opacity, drift) from `progress(now)`, so nothing is advanced per frame.
 */
export interface TimedOverlay {
    readonly durationMs: number;
    /** Restart the window at `now`. Later triggers replace earlier ones. */
    trigger(now: number): void;
    /** Timestamp the window closes at, or `null` before the first trigger. */
    expiresAt(): number | null;
    isActive(now: number): boolean;
    /** Fraction of the window elapsed, clamped to [0, 1]. 1 when untriggered. */
    progress(now: number): number;
}

export interface TimedOverlayOptions {
    readonly durationMs: number;
    /** Trigger immediately at this time. */
    readonly startedAt?: number;
}

export const createTimedOverlay = ({ durationMs, startedAt }: TimedOverlayOptions): TimedOverlay => {
    const duration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
    let triggeredAt: number | null = startedAt ?? null;

    const expiresAt = (): number | null => (triggeredAt === null ? null : triggeredAt + duration);

    return {
        durationMs: duration,
        trigger: (now) => {
            triggeredAt = now;
        },
        expiresAt,
        isActive: (now) => {
            const expiry = expiresAt();
            return expiry !== null && now < expiry;
        },
        progress: (now) => {
            if (triggeredAt === null || duration === 0) {
                return 1;
            }
            return clamp((now - triggeredAt) / duration, 0, 1);
        },
    };
};
