import type { Actor } from 'game/actor';
import type { FallingItem } from 'game/falling-item';
import type { TransientMessage } from 'game/transient-message';
import type { Rectangle, Size, Vector2 } from 'types';
import { rectangleCenteredAt } from 'util/geometry';
import type { AnimationPlayer } from './animation-player';
import { FULL_OPACITY, type DrawCall, type SizedImage } from './contracts';

export interface ActorImages<TImage> {
    readonly normal: TImage;
    readonly reacting: TImage;
}

const blit = <TImage>(image: TImage, destination: Rectangle, opacity: number = FULL_OPACITY): DrawCall<TImage> => ({
    image,
    destination,
    opacity,
});

const blitCentered = <TImage>(sized: SizedImage<TImage>, center: Vector2): DrawCall<TImage> =>
    blit(sized.image, rectangleCenteredAt(center, sized.width, sized.height));

export interface PlayingScreen<TImage> {
    readonly actor: Actor;
    readonly actorImages: ActorImages<TImage>;
    readonly items: readonly FallingItem[];
    readonly itemImage: TImage;
    readonly messages: readonly TransientMessage<TImage>[];
    readonly scoreLabel: SizedImage<TImage>;
    readonly scorePosition: Vector2;
    readonly now: number;
}

/**
 * Sprites first (actor, then items), transient messages over them, score text last.
 */
export const composePlayingScreen = <TImage>(screen: PlayingScreen<TImage>): DrawCall<TImage>[] => {
    const calls: DrawCall<TImage>[] = [];
    const pose = screen.actor.poseAt(screen.now);
    calls.push(blit(pose === 'reacting' ? screen.actorImages.reacting : screen.actorImages.normal, screen.actor.bounds()));

    for (const item of screen.items) {
        if (!item.isRemoved()) {
            calls.push(blit(screen.itemImage, item.bounds()));
        }
    }

    for (const message of screen.messages) {
        if (!message.isDead()) {
            calls.push(blit(message.glyph.image, message.bounds(), message.opacity()));
        }
    }

    const { scoreLabel, scorePosition } = screen;
    calls.push(blit(scoreLabel.image, { x: scorePosition.x, y: scorePosition.y, width: scoreLabel.width, height: scoreLabel.height }));
    return calls;
};

export interface CaptionScreen<TImage> {
    readonly playfield: Size;
    readonly animation: AnimationPlayer<TImage>;
    readonly animationOffsetY: number;
    /** Stacked below the field center, one `lineSpacing` apart. */
    readonly lines: readonly SizedImage<TImage>[];
    readonly lineSpacing: number;
    readonly now: number;
}

/**
 * Centered layout shared by the ended and final screens: animation above the middle, caption lines
 * from the middle down. A missing animation frame is skipped.
 */
export const composeCaptionScreen = <TImage>(screen: CaptionScreen<TImage>): DrawCall<TImage>[] => {
    const calls: DrawCall<TImage>[] = [];
    const centerX = Math.floor(screen.playfield.width / 2);
    const centerY = Math.floor(screen.playfield.height / 2);

    const frame = screen.animation.currentFrame(screen.now);
    if (frame) {
        calls.push(blitCentered(frame, { x: centerX, y: centerY + screen.animationOffsetY }));
    }

    screen.lines.forEach((line, index) => {
        calls.push(blitCentered(line, { x: centerX, y: centerY + index * screen.lineSpacing }));
    });
    return calls;
};

/**
 * Bounds of the caption line at `index` in a caption screen.
 */
export const captionLineBounds = (
    playfield: Size,
    line: Size,
    index: number,
    lineSpacing: number,
): Rectangle =>
    rectangleCenteredAt(
        { x: Math.floor(playfield.width / 2), y: Math.floor(playfield.height / 2) + index * lineSpacing },
        line.width,
        line.height,
    );
