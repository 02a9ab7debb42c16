/**
 * ChartExport - base class of the export strategies
 * Prepares a standalone copy of the chart <svg> and hands out the result
 */

import { ExportError } from '../../errors.js';
import { strings } from '../../strings.js';
import { SVG_NS, XLINK_NS } from '../svg.js';

const XMLNS_NS = 'http://www.w3.org/2000/xmlns/';

/** Space left around the chart in exported files */
export const EXPORT_MARGIN = 50;

export interface PreparedSvg {
    svg: SVGSVGElement;
    width: number;
    height: number;
}

interface Box {
    x: number;
    y: number;
    width: number;
    height: number;
}

/**
 * The group holding the drawn chart: `g.visual`, else the first group
 */
function contentGroup(svg: SVGSVGElement): SVGGElement | null {
    return svg.querySelector<SVGGElement>('g.visual') ?? svg.querySelector('g');
}

export abstract class ChartExport {
    abstract readonly format: string;
    abstract readonly mimeType: string;

    /**
     * Render the chart into the export format
     */
    abstract toBlob(svg: SVGSVGElement): Promise<Blob>;

    /**
     * Render the chart and hand it to the browser as a download
     */
    async svgToImage(svg: SVGSVGElement, fileName: string): Promise<void> {
        try {
            const blob = await this.toBlob(svg);
            this.download(blob, this.withExtension(fileName));
        } catch (error) {
            console.error(`${strings.export.failed} (${this.format}):`, error);
            throw error;
        }
    }

    /**
     * Standalone copy of the chart: zoom/pan removed, namespaces declared,
     * viewBox fitted around the drawn content.
     */
    prepare(svg: SVGSVGElement): PreparedSvg {
        const clone = svg.cloneNode(true);
        if (!(clone instanceof SVGSVGElement)) {
            throw new ExportError('Chart element could not be copied');
        }

        const box = this.measure(svg);
        const width = box.width + 2 * EXPORT_MARGIN;
        const height = box.height + 2 * EXPORT_MARGIN;

        contentGroup(clone)?.removeAttribute('transform');
        clone.setAttributeNS(XMLNS_NS, 'xmlns', SVG_NS);
        clone.setAttributeNS(XMLNS_NS, 'xmlns:xlink', XLINK_NS);
        clone.setAttribute('viewBox', `${box.x - EXPORT_MARGIN} ${box.y - EXPORT_MARGIN} ${width} ${height}`);
        clone.setAttribute('width', String(width));
        clone.setAttribute('height', String(height));

        return { svg: clone, width, height };
    }

    serialize(svg: SVGSVGElement): string {
        return new XMLSerializer().serializeToString(svg);
    }

    protected download(blob: Blob, fileName: string): void {
        const a = document.createElement('a');
        a.href = URL.createObjectURL(blob);
        a.download = fileName;
        document.body.appendChild(a);
        a.click();
        document.body.removeChild(a);
        URL.revokeObjectURL(a.href);
    }

    private withExtension(fileName: string): string {
        const extension = `.${this.format}`;
        return fileName.toLowerCase().endsWith(extension) ? fileName : fileName + extension;
    }

    /**
     * Bounding box of the drawn content in chart coordinates. Falls back to
     * the surface size where the content has no layout (not rendered yet).
     */
    private measure(svg: SVGSVGElement): Box {
        const visual = contentGroup(svg);

        if (visual && typeof visual.getBBox === 'function') {
            const { x, y, width, height } = visual.getBBox();
            if (width > 0 && height > 0) {
                return { x, y, width, height };
            }
        }

        return { x: 0, y: 0, width: svg.clientWidth, height: svg.clientHeight };
    }
}
