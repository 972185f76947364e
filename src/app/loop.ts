export const DEFAULT_FIXED_DELTA = 1 / 60;
export const DEFAULT_STEP_MS = DEFAULT_FIXED_DELTA * 1000;
const DEFAULT_MAX_STEPS_PER_FRAME = 5;
const DEFAULT_MAX_FRAME_DELTA_MS = 100;

export type FrameCallback = (timestamp: number) => void;

/**
 * Schedules the next frame: requestAnimationFrame in a browser, a timer elsewhere.
 */
export interface FrameScheduler {
    request(callback: FrameCallback): number;
    cancel(handle: number): void;
}

const resolveNow = (): (() => number) => {
    if (typeof performance !== 'undefined' && typeof performance.now === 'function') {
        return () => performance.now();
    }

    return () => Date.now();
};

/**
 * Timer-backed scheduler that fires roughly every `frameMs`.
 */
export const createTimerScheduler = (frameMs: number = DEFAULT_STEP_MS, now: () => number = resolveNow()): FrameScheduler => {
    const timers = new Map<number, ReturnType<typeof setTimeout>>();
    let nextHandle = 1;

    return {
        request: (callback) => {
            const handle = nextHandle++;
            timers.set(
                handle,
                setTimeout(() => {
                    timers.delete(handle);
                    callback(now());
                }, frameMs),
            );
            return handle;
        },
        cancel: (handle) => {
            const timer = timers.get(handle);
            if (timer !== undefined) {
                clearTimeout(timer);
                timers.delete(handle);
            }
        },
    };
};

const resolveScheduler = (options: LoopOptions, stepMs: number, now: () => number): FrameScheduler => {
    if (options.scheduler) {
        return options.scheduler;
    }

    if (typeof window !== 'undefined' && typeof window.requestAnimationFrame === 'function') {
        return {
            request: (callback) => window.requestAnimationFrame(callback),
            cancel: (handle) => window.cancelAnimationFrame(handle),
        };
    }

    return createTimerScheduler(stepMs, now);
};

export interface LoopOptions {
    readonly fixedDelta?: number;
    readonly maxStepsPerFrame?: number;
    readonly maxFrameDeltaMs?: number;
    readonly now?: () => number;
    readonly scheduler?: FrameScheduler;
}

export interface GameLoop {
    start(): void;
    stop(): void;
    isRunning(): boolean;
    /** Simulation clock in ms. Keeps counting across stop/start. */
    elapsedMs(): number;
}

export interface LoopTick {
    /** Fixed step length in seconds. */
    readonly deltaSeconds: number;
    /** Simulation clock in ms: completed steps times the step length. */
    readonly nowMs: number;
    readonly step: number;
}

export type UpdateCallback = (tick: LoopTick) => void;
/** `alpha` is the fraction of a step left in the accumulator. */
export type RenderCallback = (alpha: number, nowMs: number) => void;

export class FixedStepLoop implements GameLoop {
    private readonly fixedDelta: number;

    private readonly stepMs: number;

    private readonly maxStepsPerFrame: number;

    private readonly maxFrameDeltaMs: number;

    private readonly now: () => number;

    private readonly scheduler: FrameScheduler;

    private accumulatorMs = 0;

    private lastTime = 0;

    private stepCount = 0;

    private frameHandle: number | undefined;

    private running = false;

    constructor(
        private readonly update: UpdateCallback,
        private readonly render: RenderCallback,
        options: LoopOptions = {},
    ) {
        const configuredDelta = options.fixedDelta ?? DEFAULT_FIXED_DELTA;
        this.fixedDelta = configuredDelta > 0 ? configuredDelta : DEFAULT_FIXED_DELTA;
        this.stepMs = this.fixedDelta * 1000;
        const maxSteps = options.maxStepsPerFrame ?? DEFAULT_MAX_STEPS_PER_FRAME;
        this.maxStepsPerFrame = Math.max(1, Math.floor(maxSteps));
        // A frame clamp below one step would starve the simulation.
        this.maxFrameDeltaMs = Math.max(this.stepMs, options.maxFrameDeltaMs ?? DEFAULT_MAX_FRAME_DELTA_MS);
        this.now = options.now ?? resolveNow();
        this.scheduler = resolveScheduler(options, this.stepMs, this.now);
    }

    start(): void {
        if (this.running) {
            return;
        }

        this.running = true;
        this.accumulatorMs = 0;
        this.lastTime = this.now();
        this.scheduleNext();
    }

    stop(): void {
        if (!this.running) {
            return;
        }

        this.running = false;
        if (this.frameHandle !== undefined) {
            this.scheduler.cancel(this.frameHandle);
            this.frameHandle = undefined;
        }
    }

    isRunning(): boolean {
        return this.running;
    }

    elapsedMs(): number {
        return this.stepCount * this.stepMs;
    }

    private scheduleNext(): void {
        this.frameHandle = this.scheduler.request(this.tick);
    }

    private readonly tick: FrameCallback = () => {
        this.frameHandle = undefined;
        if (!this.running) {
            return;
        }

        const currentTime = this.now();
        const frameDeltaMs = Math.min(Math.max(0, currentTime - this.lastTime), this.maxFrameDeltaMs);
        this.lastTime = currentTime;
        this.accumulatorMs += frameDeltaMs;

        let steps = 0;
        while (this.running && this.accumulatorMs >= this.stepMs && steps < this.maxStepsPerFrame) {
            this.stepCount += 1;
            this.accumulatorMs -= this.stepMs;
            steps += 1;
            this.update({ deltaSeconds: this.fixedDelta, nowMs: this.elapsedMs(), step: this.stepCount });
        }

        if (!this.running) {
            return;
        }

        if (steps === this.maxStepsPerFrame && this.accumulatorMs > this.stepMs) {
            // Drop the backlog once the step cap is hit.
            this.accumulatorMs = this.stepMs;
        }

        this.render(Math.min(1, this.accumulatorMs / this.stepMs), this.elapsedMs());
        this.scheduleNext();
    };
}

export const createGameLoop = (
    update: UpdateCallback,
    render: RenderCallback,
    options?: LoopOptions,
): GameLoop => new FixedStepLoop(update, render, options);
