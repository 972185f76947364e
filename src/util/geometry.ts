/**
 * Geometry Utilities
 *
 * Purpose: Rectangle helpers for placement, clamping and overlap tests
 */

import type { Rectangle, Vector2 } from 'types';

/**
 * Create a new Rectangle
 */
export function createRectangle(x = 0, y = 0, width = 0, height = 0): Rectangle {
    return { x, y, width, height };
}

/**
 * Create a rectangle of the given size whose center sits on `center`
 */
export function rectangleCenteredAt(center: Vector2, width: number, height: number): Rectangle {
    return {
        x: center.x - width / 2,
        y: center.y - height / 2,
        width,
        height,
    };
}

/**
 * Create a rectangle of the given size whose bottom edge midpoint sits on `anchor`
 */
export function rectangleFromMidBottom(anchor: Vector2, width: number, height: number): Rectangle {
    return {
        x: anchor.x - width / 2,
        y: anchor.y - height,
        width,
        height,
    };
}

/**
 * Get the center point of a rectangle
 */
export function rectangleCenter(rect: Rectangle): Vector2 {
    return {
        x: rect.x + rect.width / 2,
        y: rect.y + rect.height / 2,
    };
}

/**
 * Grow a rectangle by `margin` on every side, keeping its center
 */
export function inflateRectangle(rect: Rectangle, margin: number): Rectangle {
    return {
        x: rect.x - margin,
        y: rect.y - margin,
        width: rect.width + margin * 2,
        height: rect.height + margin * 2,
    };
}

/**
 * Check if a point is inside a rectangle (edges inclusive)
 */
export function pointInRectangle(point: Vector2, rect: Rectangle): boolean {
    return point.x >= rect.x &&
        point.x <= rect.x + rect.width &&
        point.y >= rect.y &&
        point.y <= rect.y + rect.height;
}

/**
 * Check if two rectangles intersect. Touching edges do not count.
 */
export function rectanglesIntersect(a: Rectangle, b: Rectangle): boolean {
    return !(a.x + a.width <= b.x ||
        b.x + b.width <= a.x ||
        a.y + a.height <= b.y ||
        b.y + b.height <= a.y);
}

/**
 * Shift a rectangle horizontally so it lies within [0, width]
 */
export function clampRectangleX(rect: Rectangle, width: number): Rectangle {
    if (rect.x < 0) {
        return { ...rect, x: 0 };
    }
    if (rect.x + rect.width > width) {
        return { ...rect, x: width - rect.width };
    }
    return rect;
}

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}
