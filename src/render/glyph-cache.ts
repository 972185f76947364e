import type { FontSize, Glyph, TextRenderer } from './contracts';

/**
 * Memoizes rendered text so per-frame labels (score, prompts) are rendered once per distinct string.
 */
export interface GlyphCache<TImage> extends TextRenderer<TImage> {
    readonly size: () => number;
    readonly clear: () => void;
}

export const createGlyphCache = <TImage>(renderer: TextRenderer<TImage>): GlyphCache<TImage> => {
    const cache = new Map<string, Glyph<TImage>>();

    const render = (text: string, font: FontSize): Glyph<TImage> => {
        const key = `${font}\u0000${text}`;
        const cached = cache.get(key);
        if (cached) {
            return cached;
        }
        const glyph = renderer.render(text, font);
        cache.set(key, glyph);
        return glyph;
    };

    return {
        render,
        size: () => cache.size,
        clear: () => cache.clear(),
    };
};
