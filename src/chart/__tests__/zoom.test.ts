/**
 * Chart Zoom Tests
 *
 * Tests for pan and zoom of the content group:
 * - Programmatic controls and scale bounds
 * - Ctrl + wheel zoom, plain wheel passthrough
 * - Touch pan and pinch zoom
 * - Drag threshold for click suppression
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ChartZoom, MAX_SCALE, MIN_SCALE } from '../zoom.js';
import { createSvgElement } from '../svg.js';

interface TouchPoint {
    clientX: number;
    clientY: number;
}

function touchEvent(type: string, points: TouchPoint[]): Event {
    const event = new Event(type, { bubbles: true, cancelable: true });
    Object.defineProperty(event, 'touches', { value: points });
    return event;
}

let svg: SVGSVGElement;
let group: SVGGElement;
let zoom: ChartZoom;

beforeEach(() => {
    document.body.innerHTML = '';
    svg = createSvgElement(document, 'svg');
    group = createSvgElement(document, 'g');
    svg.appendChild(group);
    document.body.appendChild(svg);

    zoom = new ChartZoom(group);
    zoom.attach(svg);
});

describe('controls', () => {
    it('applies the identity transform on attach', () => {
        expect(group.getAttribute('transform')).toBe('translate(0,0) scale(1)');
    });

    it('scales around the given point', () => {
        zoom.scaleBy(2, { x: 100, y: 50 });

        expect(zoom.transform).toEqual({ k: 2, x: -100, y: -50 });
        expect(group.getAttribute('transform')).toBe('translate(-100,-50) scale(2)');
    });

    it('clamps the scale', () => {
        zoom.scaleBy(1000, { x: 0, y: 0 });
        expect(zoom.getScale()).toBe(MAX_SCALE);

        zoom.scaleBy(0.000001, { x: 0, y: 0 });
        expect(zoom.getScale()).toBe(MIN_SCALE);
    });

    it('translates by and to', () => {
        zoom.translateBy(10, -5);
        zoom.translateBy(10, -5);
        expect(zoom.transform).toEqual({ k: 1, x: 20, y: -10 });

        zoom.translateTo(3, 4);
        expect(zoom.transform).toEqual({ k: 1, x: 3, y: 4 });
    });

    it('zooms in around the viewport center', () => {
        Object.defineProperty(svg, 'clientWidth', { value: 200 });
        Object.defineProperty(svg, 'clientHeight', { value: 100 });

        zoom.zoomIn();

        expect(zoom.getScale()).toBeCloseTo(1.3);
        expect(zoom.transform.x).toBeCloseTo(-30);
        expect(zoom.transform.y).toBeCloseTo(-15);
    });

    it('zooms out around the viewport center', () => {
        Object.defineProperty(svg, 'clientWidth', { value: 200 });
        Object.defineProperty(svg, 'clientHeight', { value: 100 });

        zoom.zoomOut();

        expect(zoom.getScale()).toBeCloseTo(1 / 1.3);
        expect(zoom.transform.x).toBeCloseTo(100 - 100 / 1.3);
        expect(zoom.transform.y).toBeCloseTo(50 - 50 / 1.3);
    });

    it('resets to the identity transform', () => {
        zoom.scaleBy(3, { x: 10, y: 10 });
        zoom.reset();

        expect(zoom.transform).toEqual({ k: 1, x: 0, y: 0 });
        expect(group.getAttribute('transform')).toBe('translate(0,0) scale(1)');
    });
});

describe('wheel', () => {
    it('zooms out with Ctrl + wheel down', () => {
        const event = new WheelEvent('wheel', { deltaY: 100, ctrlKey: true, cancelable: true });
        svg.dispatchEvent(event);

        expect(zoom.getScale()).toBeCloseTo(0.9);
        expect(event.defaultPrevented).toBe(true);
    });

    it('leaves plain wheel to the page', () => {
        const event = new WheelEvent('wheel', { deltaY: 100, cancelable: true });
        svg.dispatchEvent(event);

        expect(zoom.getScale()).toBe(1);
        expect(event.defaultPrevented).toBe(false);
    });
});

describe('touch', () => {
    it('pans with one finger', () => {
        svg.dispatchEvent(touchEvent('touchstart', [{ clientX: 10, clientY: 10 }]));
        svg.dispatchEvent(touchEvent('touchmove', [{ clientX: 30, clientY: 25 }]));

        expect(zoom.transform).toEqual({ k: 1, x: 20, y: 15 });
    });

    it('zooms toward the pinch center', () => {
        svg.dispatchEvent(touchEvent('touchstart', [{ clientX: 0, clientY: 0 }, { clientX: 100, clientY: 0 }]));
        svg.dispatchEvent(touchEvent('touchmove', [{ clientX: 0, clientY: 0 }, { clientX: 200, clientY: 0 }]));

        expect(zoom.transform).toEqual({ k: 2, x: -100, y: 0 });
    });

    it('stops panning once all fingers are lifted', () => {
        svg.dispatchEvent(touchEvent('touchstart', [{ clientX: 10, clientY: 10 }]));
        svg.dispatchEvent(touchEvent('touchend', []));
        svg.dispatchEvent(touchEvent('touchmove', [{ clientX: 30, clientY: 25 }]));

        expect(zoom.transform).toEqual({ k: 1, x: 0, y: 0 });
    });
});

describe('mouse drag', () => {
    function drag(toX: number): MouseEvent {
        svg.dispatchEvent(new MouseEvent('mousedown', { button: 0, clientX: 0, clientY: 0 }));
        svg.dispatchEvent(new MouseEvent('mousemove', { clientX: toX, clientY: 0 }));
        svg.dispatchEvent(new MouseEvent('mouseup', { clientX: toX, clientY: 0 }));

        const click = new MouseEvent('click', { cancelable: true });
        svg.dispatchEvent(click);
        return click;
    }

    it('pans and swallows the click after a drag', () => {
        const click = drag(40);

        expect(zoom.transform).toEqual({ k: 1, x: 40, y: 0 });
        expect(click.defaultPrevented).toBe(true);
    });

    it('keeps the click after a small movement', () => {
        const click = drag(5);

        expect(zoom.transform).toEqual({ k: 1, x: 5, y: 0 });
        expect(click.defaultPrevented).toBe(false);
    });

    it('ignores moves without a pressed button', () => {
        svg.dispatchEvent(new MouseEvent('mousemove', { clientX: 40, clientY: 0 }));

        expect(zoom.transform).toEqual({ k: 1, x: 0, y: 0 });
    });
});
