/**
 * ChartZoom - Pan and zoom for the chart's content group
 * Works with both mouse and touch devices
 *
 * The engine only ever writes the `transform` attribute of the group it was
 * created for, and only in response to pointer and gesture events or the
 * public controls below.
 */

import { DomInteractionSource, InteractionSource } from './interaction.js';

// Constants for pointer handling
export const MIN_SCALE = 0.1;
export const MAX_SCALE = 20;
export const DRAG_THRESHOLD_PX = 10;   // Max movement that still counts as a click
const WHEEL_ZOOM_IN = 1.1;
const WHEEL_ZOOM_OUT = 0.9;
const ZOOM_BUTTON_FACTOR = 1.3;

export interface ZoomTransform {
    /** Scale */
    k: number;
    x: number;
    y: number;
}

interface Point {
    x: number;
    y: number;
}

interface TouchState {
    lastX: number;
    lastY: number;
}

/** Minimal view of a touch list, as delivered by DOM touch events */
interface TouchPoints {
    readonly length: number;
    readonly [index: number]: { clientX: number; clientY: number };
}

export class ChartZoom {
    private scale = 1;
    private tx = 0;
    private ty = 0;

    private surface: SVGSVGElement | null = null;

    // Mouse dragging
    private dragging = false;
    private dragStartX = 0;
    private dragStartY = 0;
    private dragOriginX = 0;
    private dragOriginY = 0;
    private dragMoved = false;
    private suppressClick = false;

    // Touch handling
    private touchState: TouchState | null = null;
    private lastPinchDistance = 0;

    constructor(private readonly visual: SVGGElement) {}

    /**
     * Bind to the pointer events of the drawing surface
     */
    attach(surface: SVGSVGElement, source: InteractionSource = new DomInteractionSource(surface)): void {
        this.surface = surface;

        // Mouse events
        source.listen('mousedown', (e) => this.onMouseDown(e));
        source.listen('mousemove', (e) => this.onMouseMove(e));
        source.listen('mouseup', () => this.onMouseUp());
        source.listen('mouseleave', () => this.onMouseUp());
        source.listen('wheel', (e) => this.onWheel(e), { passive: false });

        // A drag must not end in a click on whatever is under the pointer
        source.listen('click', (e) => this.onClick(e), { capture: true });

        // Touch events - use passive: false only where needed
        source.listen('touchstart', (e) => this.onTouchStart(e), { passive: false });
        source.listen('touchmove', (e) => this.onTouchMove(e), { passive: false });
        source.listen('touchend', (e) => this.onTouchEnd(e));
        source.listen('touchcancel', () => this.onTouchCancel());

        this.apply();
    }

    // ==================== MOUSE EVENTS ====================

    private onMouseDown(e: MouseEvent): void {
        if (e.button !== 0) return;

        this.dragging = true;
        this.dragMoved = false;
        this.dragOriginX = e.clientX;
        this.dragOriginY = e.clientY;
        this.dragStartX = e.clientX - this.tx;
        this.dragStartY = e.clientY - this.ty;
    }

    private onMouseMove(e: MouseEvent): void {
        if (!this.dragging) return;

        const distance = Math.hypot(e.clientX - this.dragOriginX, e.clientY - this.dragOriginY);
        if (distance > DRAG_THRESHOLD_PX) {
            this.dragMoved = true;
        }

        this.tx = e.clientX - this.dragStartX;
        this.ty = e.clientY - this.dragStartY;
        this.apply();
    }

    private onMouseUp(): void {
        if (this.dragging && this.dragMoved) {
            this.suppressClick = true;
        }
        this.dragging = false;
        this.dragMoved = false;
    }

    private onClick(e: MouseEvent): void {
        if (this.suppressClick) {
            this.suppressClick = false;
            e.preventDefault();
        }
    }

    private onWheel(e: WheelEvent): void {
        // Plain wheel scrolls the page
        if (!e.ctrlKey) return;

        e.preventDefault();

        const point = this.toSurfacePoint(e.clientX, e.clientY);
        this.zoomToPoint(point.x, point.y, e.deltaY > 0 ? WHEEL_ZOOM_OUT : WHEEL_ZOOM_IN);
    }

    // ==================== TOUCH EVENTS ====================

    private onTouchStart(e: TouchEvent): void {
        const touches: TouchPoints = e.touches;

        if (touches.length === 1) {
            // Single finger - pan
            this.touchState = { lastX: touches[0].clientX, lastY: touches[0].clientY };
        } else if (touches.length === 2) {
            // Two fingers - pinch zoom
            e.preventDefault();
            this.touchState = null;
            this.lastPinchDistance = this.getTouchDistance(touches);
        }
    }

    private onTouchMove(e: TouchEvent): void {
        const touches: TouchPoints = e.touches;

        if (touches.length === 1 && this.touchState) {
            e.preventDefault();

            const touch = touches[0];
            this.tx += touch.clientX - this.touchState.lastX;
            this.ty += touch.clientY - this.touchState.lastY;
            this.apply();

            this.touchState.lastX = touch.clientX;
            this.touchState.lastY = touch.clientY;
        } else if (touches.length >= 2) {
            // Pinch zoom
            e.preventDefault();

            const newDistance = this.getTouchDistance(touches);
            if (this.lastPinchDistance > 0) {
                const center = this.getTouchCenter(touches);
                const point = this.toSurfacePoint(center.x, center.y);

                // Zoom toward pinch center
                this.zoomToPoint(point.x, point.y, newDistance / this.lastPinchDistance);
            }
            this.lastPinchDistance = newDistance;
        }
    }

    private onTouchEnd(e: TouchEvent): void {
        const touches: TouchPoints = e.touches;

        if (touches.length === 0) {
            // All fingers lifted
            this.lastPinchDistance = 0;
            this.touchState = null;
        } else if (touches.length === 1 && this.lastPinchDistance > 0) {
            // Went from pinch to single finger - continue as pan
            this.lastPinchDistance = 0;
            this.touchState = { lastX: touches[0].clientX, lastY: touches[0].clientY };
        }
    }

    private onTouchCancel(): void {
        this.touchState = null;
        this.lastPinchDistance = 0;
    }

    // ==================== HELPER METHODS ====================

    private toSurfacePoint(clientX: number, clientY: number): Point {
        if (!this.surface) {
            return { x: clientX, y: clientY };
        }

        const rect = this.surface.getBoundingClientRect();
        return { x: clientX - rect.left, y: clientY - rect.top };
    }

    private getTouchDistance(touches: TouchPoints): number {
        const dx = touches[0].clientX - touches[1].clientX;
        const dy = touches[0].clientY - touches[1].clientY;
        return Math.sqrt(dx * dx + dy * dy);
    }

    private getTouchCenter(touches: TouchPoints): Point {
        return {
            x: (touches[0].clientX + touches[1].clientX) / 2,
            y: (touches[0].clientY + touches[1].clientY) / 2
        };
    }

    /**
     * Zoom toward a specific point in surface coordinates
     */
    private zoomToPoint(pointX: number, pointY: number, scaleFactor: number): void {
        const oldScale = this.scale;
        const newScale = Math.max(MIN_SCALE, Math.min(MAX_SCALE, this.scale * scaleFactor));

        if (newScale === oldScale) return;

        // point_surface = point_chart * scale + t, keep point_surface fixed
        const chartX = (pointX - this.tx) / oldScale;
        const chartY = (pointY - this.ty) / oldScale;

        this.scale = newScale;
        this.tx = pointX - chartX * newScale;
        this.ty = pointY - chartY * newScale;

        this.apply();
    }

    private viewportCenter(): Point {
        if (!this.surface) {
            return { x: 0, y: 0 };
        }
        return { x: this.surface.clientWidth / 2, y: this.surface.clientHeight / 2 };
    }

    // ==================== PUBLIC CONTROLS ====================

    /**
     * Multiply the scale by factor, keeping the given surface point
     * (default: viewport center) in place
     */
    scaleBy(factor: number, point: Point = this.viewportCenter()): void {
        this.zoomToPoint(point.x, point.y, factor);
    }

    zoomIn(): void {
        this.scaleBy(ZOOM_BUTTON_FACTOR);
    }

    zoomOut(): void {
        this.scaleBy(1 / ZOOM_BUTTON_FACTOR);
    }

    translateBy(dx: number, dy: number): void {
        this.tx += dx;
        this.ty += dy;
        this.apply();
    }

    translateTo(x: number, y: number): void {
        this.tx = x;
        this.ty = y;
        this.apply();
    }

    reset(): void {
        this.scale = 1;
        this.tx = 0;
        this.ty = 0;
        this.apply();
    }

    get transform(): ZoomTransform {
        return { k: this.scale, x: this.tx, y: this.ty };
    }

    /**
     * Get current scale (for UI display)
     */
    getScale(): number {
        return this.scale;
    }

    private apply(): void {
        this.visual.setAttribute('transform', `translate(${this.tx},${this.ty}) scale(${this.scale})`);
    }
}
