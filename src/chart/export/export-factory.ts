/**
 * ExportFactory - picks the export strategy for a requested format
 * New formats are added here (or through register()) and nowhere else.
 */

import { UnsupportedExportFormatError } from '../../errors.js';
import { ChartExport } from './export.js';
import { PngExport } from './png-export.js';
import { SvgExport } from './svg-export.js';

export type ExportCreator = () => ChartExport;

export class ExportFactory {
    private readonly creators = new Map<string, ExportCreator>([
        ['png', () => new PngExport()],
        ['svg', () => new SvgExport()]
    ]);

    register(format: string, create: ExportCreator): void {
        this.creators.set(format, create);
    }

    supports(format: string): boolean {
        return this.creators.has(format);
    }

    formats(): string[] {
        return [...this.creators.keys()];
    }

    /**
     * A new exporter for format; unknown formats are an error, never a default
     */
    createExport(format: string): ChartExport {
        const create = this.creators.get(format);
        if (!create) {
            throw new UnsupportedExportFormatError(format);
        }
        return create();
    }
}
