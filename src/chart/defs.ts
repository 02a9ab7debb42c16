/**
 * ChartDefs - registry of reusable SVG definitions (gradients, patterns, markers)
 *
 * Drawn nodes reference definitions by id (`fill="url(#id)"`), so each one is
 * created once. The registry only grows while the chart is drawn; there is
 * no way to remove a definition.
 */

import { createSvgElement } from './svg.js';

export class ChartDefs {
    private readonly element: SVGDefsElement;
    private readonly definitions = new Map<string, SVGElement>();

    constructor(svg: SVGSVGElement) {
        this.element = createSvgElement(svg.ownerDocument, 'defs');
        svg.appendChild(this.element);
    }

    /**
     * Register a definition. `create` is only called the first time an id is
     * seen; later calls return the element created then.
     */
    define(id: string, create: (doc: Document) => SVGElement): SVGElement {
        const existing = this.definitions.get(id);
        if (existing) return existing;

        const definition = create(this.element.ownerDocument);
        definition.setAttribute('id', id);
        this.element.appendChild(definition);
        this.definitions.set(id, definition);

        return definition;
    }

    has(id: string): boolean {
        return this.definitions.has(id);
    }

    get(id: string): SVGElement | null {
        return this.definitions.get(id) ?? null;
    }

    ids(): string[] {
        return [...this.definitions.keys()];
    }

    /**
     * Paint reference for a registered definition
     */
    url(id: string): string {
        return `url(#${id})`;
    }

    /**
     * The underlying <defs> element
     */
    get node(): SVGDefsElement {
        return this.element;
    }
}
