import type { Rectangle } from 'types';

/**
 * An already-decoded image together with the size it should be drawn at. The image type is opaque to
 * the simulation; presenters decide what it is (a pixi Texture, a canvas, a test token).
 */
export interface SizedImage<TImage> {
    readonly image: TImage;
    readonly width: number;
    readonly height: number;
}

export type Glyph<TImage> = SizedImage<TImage>;

export type FontSize = 'large' | 'small';

/**
 * Pre-renders text into a drawable glyph.
 */
export interface TextRenderer<TImage> {
    render(text: string, font: FontSize): Glyph<TImage>;
}

export interface AnimationFrame<TImage> extends SizedImage<TImage> {
    /** Display time in milliseconds. Defaults to 100 when absent. */
    readonly durationMs?: number;
}

/**
 * One blit. `opacity` is 0–255.
 */
export interface DrawCall<TImage> {
    readonly image: TImage;
    readonly destination: Rectangle;
    readonly opacity: number;
}

export const FULL_OPACITY = 255;

export interface Presenter<TImage> {
    present(drawCalls: readonly DrawCall<TImage>[]): void;
}
