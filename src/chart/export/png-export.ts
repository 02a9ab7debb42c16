/**
 * PngExport - the chart rasterized into an image
 * The serialized SVG is loaded as an image and drawn onto a 2D canvas
 */

import { ExportError } from '../../errors.js';
import { ChartExport } from './export.js';

/** Pixel density of the exported image */
const PIXEL_RATIO = 2;

export class PngExport extends ChartExport {
    readonly format = 'png';
    readonly mimeType = 'image/png';

    async toBlob(svg: SVGSVGElement): Promise<Blob> {
        const { svg: prepared, width, height } = this.prepare(svg);
        const doc = svg.ownerDocument;

        const image = await this.loadImage(
            doc,
            `data:image/svg+xml;charset=utf-8,${encodeURIComponent(this.serialize(prepared))}`
        );

        const canvas = doc.createElement('canvas');
        canvas.width = Math.ceil(width * PIXEL_RATIO);
        canvas.height = Math.ceil(height * PIXEL_RATIO);

        const ctx = canvas.getContext('2d');
        if (!ctx) {
            throw new ExportError('2D canvas context is not available');
        }

        ctx.scale(PIXEL_RATIO, PIXEL_RATIO);
        ctx.drawImage(image, 0, 0, width, height);

        return new Promise<Blob>((resolve, reject) => {
            canvas.toBlob((blob) => {
                if (blob) {
                    resolve(blob);
                } else {
                    reject(new ExportError('Canvas could not be encoded as PNG'));
                }
            }, this.mimeType);
        });
    }

    private loadImage(doc: Document, src: string): Promise<HTMLImageElement> {
        return new Promise<HTMLImageElement>((resolve, reject) => {
            const image = doc.createElement('img');
            image.onload = () => resolve(image);
            image.onerror = () => reject(new ExportError('Chart image could not be loaded'));
            image.src = src;
        });
    }
}
