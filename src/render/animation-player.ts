import type { AnimationFrame, SizedImage } from './contracts';

export const DEFAULT_FRAME_DURATION_MS = 100;

export interface AnimationPlayer<TImage> {
    readonly frameCount: number;
    readonly totalDurationMs: number;
    readonly startedAt: number;
    /**
     * Frame on screen at absolute time `now`, or `null` when the sequence is empty. Pure: repeated
     * queries with the same `now` agree, and the result repeats every `totalDurationMs`.
     */
    currentFrame(now: number): SizedImage<TImage> | null;
}

const sanitizeDuration = (duration: number | undefined): number => {
    if (duration === undefined) {
        return DEFAULT_FRAME_DURATION_MS;
    }
    return Number.isFinite(duration) && duration > 0 ? duration : 0;
};

export const createAnimationPlayer = <TImage>(
    frames: readonly AnimationFrame<TImage>[],
    startedAt: number,
): AnimationPlayer<TImage> => {
    const sequence = frames.map(({ image, width, height }) => ({ image, width, height }));
    const cumulative: number[] = [];
    let total = 0;
    for (const frame of frames) {
        total += sanitizeDuration(frame.durationMs);
        cumulative.push(total);
    }

    const currentFrame = (now: number): SizedImage<TImage> | null => {
        const last = sequence.at(-1);
        if (!last) {
            return null;
        }
        if (total === 0) {
            return last;
        }

        const offset = (now - startedAt) % total;
        const elapsed = offset < 0 ? offset + total : offset;
        const index = cumulative.findIndex((boundary) => elapsed < boundary);
        return index === -1 ? last : sequence[index];
    };

    return {
        frameCount: sequence.length,
        totalDurationMs: total,
        startedAt,
        currentFrame,
    };
};

/**
 * A single-frame sequence for screens that show a still image.
 */
export const stillAnimation = <TImage>(image: SizedImage<TImage>): readonly AnimationFrame<TImage>[] => [
    { ...image, durationMs: DEFAULT_FRAME_DURATION_MS },
];
