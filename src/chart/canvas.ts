/**
 * ChartCanvas - the <svg> drawing surface of a pedigree chart
 *
 * Owns the definitions registry, the content group the chart is drawn into,
 * the pan/zoom engine and the export strategies.
 *
 * States:
 *   uninitialized --initialize()--> initialized --initializeInteraction()--> interactive
 *
 * initializeInteraction() is meant to be called once. Calling it again
 * creates a second content group; that is not supported.
 */

import { CanvasStateError } from '../errors.js';
import { ChartConfiguration } from '../types.js';
import { ChartDefs } from './defs.js';
import { ChartExport } from './export/export.js';
import { ExportFactory } from './export/export-factory.js';
import { DomInteractionSource, InteractionSource } from './interaction.js';
import { HintOverlay } from './overlay.js';
import { createSvgElement } from './svg.js';
import { ChartZoom } from './zoom.js';

export type CanvasState = 'uninitialized' | 'initialized' | 'interactive';

// Overlay timings (ms)
const HINT_FADE_IN = 300;
const HINT_HIDE_DELAY = 700;
const HINT_FADE_OUT = 800;

export class ChartCanvas {
    private readonly element: SVGSVGElement;
    private readonly definitions: ChartDefs;
    private readonly exportFactory = new ExportFactory();

    private visualGroup: SVGGElement | null = null;
    private zoomEngine: ChartZoom | null = null;
    private currentState: CanvasState = 'uninitialized';

    constructor(container: HTMLElement, private readonly config: ChartConfiguration) {
        this.element = createSvgElement(container.ownerDocument, 'svg');
        container.appendChild(this.element);

        this.definitions = new ChartDefs(this.element);
    }

    /**
     * Size the surface to its container and set the text rendering defaults.
     */
    initialize(): void {
        this.element.setAttribute('width', '100%');
        this.element.setAttribute('height', '100%');
        this.element.setAttribute('text-rendering', 'geometricPrecision');
        this.element.setAttribute('text-anchor', 'middle');

        if (this.currentState === 'uninitialized') {
            this.currentState = 'initialized';
        }
    }

    /**
     * Wire pointer and gesture events, create the content group and attach
     * the zoom engine to it.
     */
    initializeInteraction(overlay: HintOverlay, source: InteractionSource = new DomInteractionSource(this.element)): void {
        if (this.currentState === 'uninitialized') {
            throw new CanvasStateError(this.currentState, 'initialize interaction');
        }

        this.visualGroup = createSvgElement(this.element.ownerDocument, 'g');
        this.visualGroup.classList.add('visual');
        this.element.appendChild(this.visualGroup);

        // The zoom engine listens first: it marks clicks that end a drag,
        // which the click handler below then stops
        this.zoomEngine = new ChartZoom(this.visualGroup);
        this.zoomEngine.attach(this.element, source);

        source.listen('contextmenu', (event) => event.preventDefault());

        source.listen('wheel', (event) => {
            // Zooming needs Ctrl, plain scrolling only explains that
            if (!event.ctrlKey) {
                overlay.show(this.config.labels.zoom, HINT_FADE_IN, () => {
                    overlay.hide(HINT_HIDE_DELAY, HINT_FADE_OUT);
                });
            }
        });

        source.listen('touchend', (event) => {
            if (event.touches.length < 2) {
                overlay.hide(0, HINT_FADE_OUT);
            }
        });

        source.listen('touchmove', (event) => {
            if (event.touches.length >= 2) {
                // Pinch zoom in progress
                overlay.hide();
            } else {
                overlay.show(this.config.labels.move);
            }
        });

        source.listen('click', (event) => this.doStopPropagation(event), { capture: true });

        if (this.config.rtl) {
            this.element.classList.add('rtl');
        }

        this.currentState = 'interactive';
    }

    /**
     * Stop clicks whose default action was prevented (end of a drag)
     */
    private doStopPropagation(event: MouseEvent): void {
        if (event.defaultPrevented) {
            event.stopPropagation();
        }
    }

    /**
     * A new exporter for the given format ("png" or "svg").
     */
    export(format: string): ChartExport {
        if (this.currentState === 'uninitialized') {
            throw new CanvasStateError(this.currentState, 'export');
        }
        return this.exportFactory.createExport(format);
    }

    get state(): CanvasState {
        return this.currentState;
    }

    get configuration(): ChartConfiguration {
        return this.config;
    }

    get defs(): ChartDefs {
        return this.definitions;
    }

    /**
     * Pan/zoom engine, null until interaction is initialized
     */
    get zoom(): ChartZoom | null {
        return this.zoomEngine;
    }

    /**
     * Content group all chart nodes are drawn into, null until interaction
     * is initialized
     */
    get visual(): SVGGElement | null {
        return this.visualGroup;
    }

    /**
     * Returns the <svg> element.
     */
    get(): SVGSVGElement {
        return this.element;
    }
}
