/**
 * Shared Type Definitions
 *
 * Purpose: Geometry primitives shared by the simulation, input and render modules
 */

/**
 * 2D vector with x and y coordinates
 */
export interface Vector2 {
    readonly x: number;
    readonly y: number;
}

/**
 * Axis-aligned rectangle in screen coordinates (y grows downward)
 */
export interface Rectangle {
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
}

/**
 * Width/height pair
 */
export interface Size {
    readonly width: number;
    readonly height: number;
}
