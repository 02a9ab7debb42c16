/**
 * SvgExport - the chart as a standalone vector file
 */

import { ChartExport } from './export.js';

export class SvgExport extends ChartExport {
    readonly format = 'svg';
    readonly mimeType = 'image/svg+xml';

    async toBlob(svg: SVGSVGElement): Promise<Blob> {
        const { svg: prepared } = this.prepare(svg);
        const markup = '<?xml version="1.0" encoding="UTF-8"?>\n' + this.serialize(prepared);

        return new Blob([markup], { type: `${this.mimeType};charset=utf-8` });
    }
}
