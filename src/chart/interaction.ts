/**
 * Interaction sources - where the canvas and the zoom engine get their
 * pointer and gesture events from
 *
 * In the browser this is the <svg> element itself. Hosts without native
 * touch or wheel events can pass their own source that synthesizes them.
 */

export type InteractionEventType =
    | 'contextmenu'
    | 'wheel'
    | 'click'
    | 'mousedown'
    | 'mousemove'
    | 'mouseup'
    | 'mouseleave'
    | 'touchstart'
    | 'touchmove'
    | 'touchend'
    | 'touchcancel';

export type InteractionEvent<K extends InteractionEventType> = SVGElementEventMap[K];

export interface ListenOptions {
    capture?: boolean;
    passive?: boolean;
}

export interface InteractionSource {
    listen<K extends InteractionEventType>(
        type: K,
        listener: (event: InteractionEvent<K>) => void,
        options?: ListenOptions
    ): void;
}

export class DomInteractionSource implements InteractionSource {
    constructor(private readonly target: SVGElement) {}

    listen<K extends InteractionEventType>(
        type: K,
        listener: (event: InteractionEvent<K>) => void,
        options: ListenOptions = {}
    ): void {
        this.target.addEventListener(type, listener, options);
    }
}
