/**
 * Chart Canvas Tests
 *
 * Tests for the drawing surface:
 * - State machine (uninitialized → initialized → interactive)
 * - Content group and zoom engine creation
 * - Overlay hints for wheel and touch gestures
 * - Click suppression after a drag
 * - Export format selection
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ChartCanvas } from '../canvas.js';
import { createConfiguration } from '../configuration.js';
import { PngExport } from '../export/png-export.js';
import { SvgExport } from '../export/svg-export.js';
import { createSvgElement } from '../svg.js';
import { ChartZoom } from '../zoom.js';
import { CanvasStateError, UnsupportedExportFormatError } from '../../errors.js';
import { setLanguage } from '../../strings.js';

interface TouchPoint {
    clientX: number;
    clientY: number;
}

function touchEvent(type: string, points: TouchPoint[]): Event {
    const event = new Event(type, { bubbles: true, cancelable: true });
    Object.defineProperty(event, 'touches', { value: points });
    return event;
}

function createOverlay() {
    return { show: vi.fn(), hide: vi.fn() };
}

let container: HTMLDivElement;

beforeEach(() => {
    setLanguage('en');
    document.body.innerHTML = '';
    container = document.createElement('div');
    document.body.appendChild(container);
});

describe('ChartCanvas construction', () => {
    it('appends an svg with a defs element to the container', () => {
        const canvas = new ChartCanvas(container, createConfiguration());

        expect(container.querySelector('svg')).toBe(canvas.get());
        expect(canvas.get().querySelector('defs')).toBe(canvas.defs.node);
    });

    it('starts uninitialized without content group or zoom', () => {
        const canvas = new ChartCanvas(container, createConfiguration());

        expect(canvas.state).toBe('uninitialized');
        expect(canvas.visual).toBeNull();
        expect(canvas.zoom).toBeNull();
    });
});

describe('initialize', () => {
    it('sets the surface attributes', () => {
        const canvas = new ChartCanvas(container, createConfiguration());
        canvas.initialize();

        const svg = canvas.get();
        expect(svg.getAttribute('width')).toBe('100%');
        expect(svg.getAttribute('height')).toBe('100%');
        expect(svg.getAttribute('text-rendering')).toBe('geometricPrecision');
        expect(svg.getAttribute('text-anchor')).toBe('middle');
        expect(canvas.state).toBe('initialized');
    });
});

describe('initializeInteraction', () => {
    it('fails before initialize()', () => {
        const canvas = new ChartCanvas(container, createConfiguration());

        expect(() => canvas.initializeInteraction(createOverlay())).toThrow(CanvasStateError);
        expect(canvas.get().querySelectorAll('g')).toHaveLength(0);
        expect(canvas.state).toBe('uninitialized');
    });

    it('creates exactly one content group with a zoom engine', () => {
        const canvas = new ChartCanvas(container, createConfiguration());
        canvas.initialize();
        canvas.initializeInteraction(createOverlay());

        const groups = canvas.get().querySelectorAll('g.visual');
        expect(groups).toHaveLength(1);
        expect(canvas.visual).toBe(groups[0]);
        expect(canvas.zoom).toBeInstanceOf(ChartZoom);
        expect(canvas.state).toBe('interactive');
    });

    it('marks right-to-left charts', () => {
        const canvas = new ChartCanvas(container, createConfiguration({ textDirection: 'rtl' }));
        canvas.initialize();
        canvas.initializeInteraction(createOverlay());

        expect(canvas.get().classList.contains('rtl')).toBe(true);
    });

    it('does not mark left-to-right charts', () => {
        const canvas = new ChartCanvas(container, createConfiguration());
        canvas.initialize();
        canvas.initializeInteraction(createOverlay());

        expect(canvas.get().classList.contains('rtl')).toBe(false);
    });
});

describe('interaction events', () => {
    let canvas: ChartCanvas;
    let overlay: ReturnType<typeof createOverlay>;

    beforeEach(() => {
        canvas = new ChartCanvas(container, createConfiguration({ labels: { zoom: 'Zoom hint', move: 'Move hint' } }));
        canvas.initialize();
        overlay = createOverlay();
        canvas.initializeInteraction(overlay);
    });

    it('suppresses the context menu', () => {
        const event = new MouseEvent('contextmenu', { bubbles: true, cancelable: true });
        canvas.get().dispatchEvent(event);

        expect(event.defaultPrevented).toBe(true);
    });

    it('shows the zoom hint on plain wheel and hides it afterwards', () => {
        canvas.get().dispatchEvent(new WheelEvent('wheel', { deltaY: 100, bubbles: true, cancelable: true }));

        expect(overlay.show).toHaveBeenCalledWith('Zoom hint', 300, expect.any(Function));
        expect(overlay.hide).not.toHaveBeenCalled();

        const onShown = overlay.show.mock.calls[0][2];
        onShown();

        expect(overlay.hide).toHaveBeenCalledWith(700, 800);
        expect(canvas.zoom?.getScale()).toBe(1);
    });

    it('zooms instead of hinting on Ctrl + wheel', () => {
        canvas.get().dispatchEvent(new WheelEvent('wheel', { deltaY: -100, ctrlKey: true, bubbles: true, cancelable: true }));

        expect(overlay.show).not.toHaveBeenCalled();
        expect(canvas.zoom?.getScale()).toBeCloseTo(1.1);
    });

    it('hides the hint while pinching', () => {
        canvas.get().dispatchEvent(touchEvent('touchmove', [{ clientX: 0, clientY: 0 }, { clientX: 50, clientY: 0 }]));

        expect(overlay.hide).toHaveBeenCalledWith();
        expect(overlay.show).not.toHaveBeenCalled();
    });

    it('shows the move hint on single finger drag', () => {
        canvas.get().dispatchEvent(touchEvent('touchmove', [{ clientX: 10, clientY: 10 }]));

        expect(overlay.show).toHaveBeenCalledWith('Move hint');
    });

    it('hides the hint with a delay when fingers are lifted', () => {
        canvas.get().dispatchEvent(touchEvent('touchend', [{ clientX: 10, clientY: 10 }]));

        expect(overlay.hide).toHaveBeenCalledWith(0, 800);
    });

    it('keeps the hint while two fingers remain', () => {
        canvas.get().dispatchEvent(touchEvent('touchend', [{ clientX: 0, clientY: 0 }, { clientX: 50, clientY: 0 }]));

        expect(overlay.hide).not.toHaveBeenCalled();
    });

    it('lets plain clicks through to chart nodes', () => {
        const node = createSvgElement(document, 'rect');
        const onClick = vi.fn();
        node.addEventListener('click', onClick);
        canvas.visual?.appendChild(node);

        node.dispatchEvent(new MouseEvent('click', { bubbles: true, cancelable: true }));

        expect(onClick).toHaveBeenCalledTimes(1);
    });

    it('stops the click that ends a drag', () => {
        const node = createSvgElement(document, 'rect');
        const onClick = vi.fn();
        node.addEventListener('click', onClick);
        canvas.visual?.appendChild(node);

        const svg = canvas.get();
        svg.dispatchEvent(new MouseEvent('mousedown', { button: 0, clientX: 0, clientY: 0, bubbles: true }));
        svg.dispatchEvent(new MouseEvent('mousemove', { clientX: 50, clientY: 0, bubbles: true }));
        svg.dispatchEvent(new MouseEvent('mouseup', { clientX: 50, clientY: 0, bubbles: true }));

        const click = new MouseEvent('click', { bubbles: true, cancelable: true });
        node.dispatchEvent(click);

        expect(click.defaultPrevented).toBe(true);
        expect(onClick).not.toHaveBeenCalled();
        expect(canvas.visual?.getAttribute('transform')).toBe('translate(50,0) scale(1)');
    });
});

describe('export', () => {
    it('fails before initialize()', () => {
        const canvas = new ChartCanvas(container, createConfiguration());

        expect(() => canvas.export('svg')).toThrow(CanvasStateError);
    });

    it('returns an exporter per format', () => {
        const canvas = new ChartCanvas(container, createConfiguration());
        canvas.initialize();

        const svg = canvas.export('svg');
        const png = canvas.export('png');

        expect(svg).toBeInstanceOf(SvgExport);
        expect(png).toBeInstanceOf(PngExport);
        expect(svg).not.toBe(png);
        expect(canvas.export('svg')).not.toBe(svg);
    });

    it('rejects unknown formats', () => {
        const canvas = new ChartCanvas(container, createConfiguration());
        canvas.initialize();

        expect(() => canvas.export('bogus')).toThrow(UnsupportedExportFormatError);
        expect(() => canvas.export('bogus')).toThrow('Unsupported export format: "bogus"');
    });

    it('is available after interaction is initialized', () => {
        const canvas = new ChartCanvas(container, createConfiguration());
        canvas.initialize();
        canvas.initializeInteraction(createOverlay());

        expect(canvas.export('png')).toBeInstanceOf(PngExport);
    });
});
