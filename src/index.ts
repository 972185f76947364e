export { createEventBus } from 'app/events';
export type { CatcherEventBus, CatcherEventMap, CatcherEventName, EventEnvelope } from 'app/events';
export { createGameRuntime } from 'app/game-runtime';
export type { GameAssets, GameRuntime, GameRuntimeOptions, StepResult } from 'app/game-runtime';
export { autopilot, headlessTextRenderer, runHeadlessSession } from 'app/headless';
export type { HeadlessSessionOptions, HeadlessSessionResult } from 'app/headless';
export { createGameLoop, createTimerScheduler, FixedStepLoop } from 'app/loop';
export type { FrameScheduler, GameLoop, LoopOptions } from 'app/loop';
export { canTransition, PHASE_SUBSYSTEMS } from 'app/phase-machine';
export { createSessionDriver } from 'app/session-driver';
export type { SessionDriver, SessionDriverOptions } from 'app/session-driver';
export type { GamePhase, GameSessionSnapshot } from 'app/state';
export { createGameConfig, gameConfig, validateGameConfig } from 'config/game';
export type { GameConfig, GameConfigOverrides } from 'config/game';
export type { FrameInput, InputEvent, InputSource } from 'input/contracts';
export { createDomInput, DomInputManager } from 'input/input-manager';
export { createAnimationPlayer, stillAnimation } from 'render/animation-player';
export type { AnimationFrame, DrawCall, FontSize, Glyph, Presenter, TextRenderer } from 'render/contracts';
export { createPixiTextRenderer, PixiPresenter } from 'render/pixi-presenter';
export { createLogger } from 'util/log';
export type { Logger, LogLevel } from 'util/log';
export { createRandomManager } from 'util/random';
