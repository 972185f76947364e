import { Container, Sprite, Text, TextStyle, Texture } from 'pixi.js';
import { FULL_OPACITY, type DrawCall, type FontSize, type Glyph, type Presenter, type TextRenderer } from './contracts';

interface TextureRenderer {
    readonly generateTexture: (displayObject: Text) => Texture;
}

/**
 * Blits draw lists onto a pixi container. Sprites are pooled; child order follows draw order, so later
 * calls land on top.
 */
export class PixiPresenter implements Presenter<Texture> {
    private readonly layer: Container;
    private readonly pool: Sprite[] = [];

    constructor(layer: Container) {
        this.layer = layer;
    }

    present(drawCalls: readonly DrawCall<Texture>[]): void {
        drawCalls.forEach((call, index) => {
            const sprite = this.spriteAt(index);
            sprite.texture = call.image;
            sprite.x = call.destination.x;
            sprite.y = call.destination.y;
            sprite.width = call.destination.width;
            sprite.height = call.destination.height;
            sprite.alpha = Math.min(1, Math.max(0, call.opacity / FULL_OPACITY));
            sprite.visible = true;
        });

        for (let index = drawCalls.length; index < this.pool.length; index += 1) {
            this.pool[index].visible = false;
        }
    }

    spriteCount(): number {
        return this.pool.length;
    }

    private spriteAt(index: number): Sprite {
        const existing = this.pool.at(index);
        if (existing) {
            return existing;
        }
        const sprite = new Sprite(Texture.EMPTY);
        this.layer.addChild(sprite);
        this.pool.push(sprite);
        return sprite;
    }
}

const FONT_SIZES: Record<FontSize, number> = {
    large: 36,
    small: 24,
};

export interface PixiTextOptions {
    readonly fontFamily?: string;
    readonly fill?: number;
}

/**
 * Renders text to textures once; pair with a glyph cache for repeated labels.
 */
export const createPixiTextRenderer = (
    renderer: TextureRenderer,
    { fontFamily = 'sans-serif', fill = 0x000000 }: PixiTextOptions = {},
): TextRenderer<Texture> => ({
    render: (text: string, font: FontSize): Glyph<Texture> => {
        const label = new Text({
            text,
            style: new TextStyle({ fontFamily, fontSize: FONT_SIZES[font], fill }),
        });
        const texture = renderer.generateTexture(label);
        label.destroy();
        return { image: texture, width: texture.width, height: texture.height };
    },
});
