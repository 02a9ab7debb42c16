/**
 * Error types thrown by the chart core
 */

export class ChartError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class UnsupportedExportFormatError extends ChartError {
    constructor(readonly format: string) {
        super(`Unsupported export format: "${format}"`);
    }
}

export class CanvasStateError extends ChartError {
    constructor(readonly state: string, action: string) {
        super(`Cannot ${action} while canvas is ${state}`);
    }
}

export class ConfigurationError extends ChartError {}

export class MarkupParseError extends ChartError {}

export class ExportError extends ChartError {}
