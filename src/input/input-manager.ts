/**
 * Input Manager Implementation
 *
 * Purpose: Keyboard and pointer handling that feeds the per-frame input sample
 */

import type { FrameInput, InputEvent, InputSource } from './contracts';
import type { Size, Vector2 } from 'types';

const LEFT_KEYS: readonly string[] = ['ArrowLeft'];
const RIGHT_KEYS: readonly string[] = ['ArrowRight'];

export interface DomInputOptions {
    /** Element the play-field is drawn into; pointer positions are mapped onto it. */
    readonly surface: HTMLElement;
    /** Play-field size in game units. */
    readonly playfield: Size;
    readonly keyTarget?: Document;
    readonly windowRef?: Window | null;
}

const defaultWindow = (): Window | null => (typeof window === 'undefined' ? null : window);

export class DomInputManager implements InputSource {
    private readonly surface: HTMLElement;
    private readonly playfield: Size;
    private readonly keyTarget: Document;
    private readonly windowRef: Window | null;
    private readonly pressed = new Set<string>();
    private queue: InputEvent[] = [];
    private destroyed = false;
    private readonly keyDownListener: (event: KeyboardEvent) => void;
    private readonly keyUpListener: (event: KeyboardEvent) => void;
    private readonly mouseDownListener: (event: MouseEvent) => void;
    private readonly blurListener: () => void;
    private readonly pageHideListener: () => void;

    constructor({ surface, playfield, keyTarget, windowRef }: DomInputOptions) {
        this.surface = surface;
        this.playfield = playfield;
        this.keyTarget = keyTarget ?? surface.ownerDocument;
        this.windowRef = windowRef === undefined ? defaultWindow() : windowRef;
        this.keyDownListener = this.handleKeyDown.bind(this);
        this.keyUpListener = this.handleKeyUp.bind(this);
        this.mouseDownListener = this.handleMouseDown.bind(this);
        this.blurListener = () => this.pressed.clear();
        this.pageHideListener = () => this.queue.push({ type: 'quit' });

        this.keyTarget.addEventListener('keydown', this.keyDownListener);
        this.keyTarget.addEventListener('keyup', this.keyUpListener);
        this.surface.addEventListener('mousedown', this.mouseDownListener);
        this.windowRef?.addEventListener('blur', this.blurListener);
        this.windowRef?.addEventListener('pagehide', this.pageHideListener);
    }

    sample(): FrameInput {
        const events = this.queue;
        this.queue = [];
        return {
            held: {
                left: LEFT_KEYS.some((key) => this.pressed.has(key)),
                right: RIGHT_KEYS.some((key) => this.pressed.has(key)),
            },
            events,
        };
    }

    destroy(): void {
        if (this.destroyed) {
            return;
        }
        this.destroyed = true;
        this.keyTarget.removeEventListener('keydown', this.keyDownListener);
        this.keyTarget.removeEventListener('keyup', this.keyUpListener);
        this.surface.removeEventListener('mousedown', this.mouseDownListener);
        this.windowRef?.removeEventListener('blur', this.blurListener);
        this.windowRef?.removeEventListener('pagehide', this.pageHideListener);
        this.pressed.clear();
        this.queue = [];
    }

    /**
     * Map client coordinates onto the play-field, accounting for CSS scaling of the surface.
     */
    toPlayfield(clientX: number, clientY: number): Vector2 {
        const rect = this.surface.getBoundingClientRect();
        const scaleX = rect.width > 0 ? this.playfield.width / rect.width : 1;
        const scaleY = rect.height > 0 ? this.playfield.height / rect.height : 1;
        return {
            x: (clientX - rect.left) * scaleX,
            y: (clientY - rect.top) * scaleY,
        };
    }

    private handleKeyDown(event: KeyboardEvent): void {
        const directional = LEFT_KEYS.includes(event.key) || RIGHT_KEYS.includes(event.key);
        if (directional) {
            event.preventDefault();
            this.pressed.add(event.key);
        }
        if (!event.repeat) {
            this.queue.push({ type: 'keypress', key: event.key });
        }
    }

    private handleKeyUp(event: KeyboardEvent): void {
        this.pressed.delete(event.key);
    }

    private handleMouseDown(event: MouseEvent): void {
        if (event.button !== 0) {
            return;
        }
        this.queue.push({ type: 'pointer-down', position: this.toPlayfield(event.clientX, event.clientY) });
    }
}

export const createDomInput = (options: DomInputOptions): InputSource => new DomInputManager(options);
