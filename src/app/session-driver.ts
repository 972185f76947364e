import type { GameRuntime } from './game-runtime';
import { createGameLoop, type GameLoop, type LoopOptions } from './loop';
import type { InputSource } from 'input/contracts';
import type { Presenter } from 'render/contracts';
import { rootLogger, type Logger } from 'util/log';

export interface SessionDriverOptions<TImage> {
    readonly runtime: GameRuntime<TImage>;
    readonly input: InputSource;
    readonly presenter: Presenter<TImage>;
    readonly loop?: Omit<LoopOptions, 'fixedDelta' | 'maxStepsPerFrame' | 'maxFrameDeltaMs'>;
    readonly logger?: Logger;
    /** Called once after a quit stops the loop. */
    readonly onExit?: () => void;
}

export interface SessionDriver {
    start(): void;
    stop(): void;
    isRunning(): boolean;
}

/**
 * Runs one session: input is sampled before every fixed step, the latest draw list is presented on
 * every rendered frame, and a quit stops the loop and releases the input source.
 */
export const createSessionDriver = <TImage>({
    runtime,
    input,
    presenter,
    loop: loopOptions = {},
    logger = rootLogger,
    onExit,
}: SessionDriverOptions<TImage>): SessionDriver => {
    const log = logger.child('driver');
    const { fixedDelta, maxStepsPerFrame, maxFrameDeltaMs } = runtime.config.loop;
    let exited = false;

    const exit = (loop: GameLoop) => {
        if (exited) {
            return;
        }
        exited = true;
        loop.stop();
        input.destroy();
        log.info('session exited', { score: runtime.snapshot().score });
        onExit?.();
    };

    const loop: GameLoop = createGameLoop(
        ({ nowMs }) => {
            const result = runtime.step(input.sample(), nowMs);
            if (result.terminated) {
                exit(loop);
            }
        },
        (_alpha, nowMs) => {
            presenter.present(runtime.render(nowMs));
        },
        { ...loopOptions, fixedDelta, maxStepsPerFrame, maxFrameDeltaMs },
    );

    return {
        start: () => {
            if (exited) {
                log.warn('start ignored after exit');
                return;
            }
            loop.start();
        },
        stop: () => loop.stop(),
        isRunning: () => loop.isRunning(),
    };
};
