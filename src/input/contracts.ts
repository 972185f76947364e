/**
 * Input Contract
 *
 * Purpose: Per-frame input sample handed from the windowing side to the simulation
 */

import type { Vector2 } from 'types';

export interface HeldDirections {
    readonly left: boolean;
    readonly right: boolean;
}

export type InputEvent =
    | { readonly type: 'quit' }
    | { readonly type: 'keypress'; readonly key: string }
    | { readonly type: 'pointer-down'; readonly position: Vector2 };

export interface FrameInput {
    readonly held: HeldDirections;
    /** Discrete events since the previous sample, oldest first. */
    readonly events: readonly InputEvent[];
}

export interface InputSource {
    /** Read held keys and drain the event queue. */
    sample(): FrameInput;
    destroy(): void;
}

export const NO_DIRECTIONS: HeldDirections = { left: false, right: false };

export const IDLE_INPUT: FrameInput = { held: NO_DIRECTIONS, events: [] };
