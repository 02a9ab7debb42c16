/**
 * Chart Module Entry Point
 *
 * Usage:
 *   import { ChartCanvas, ChartOverlay, createConfiguration } from './chart/index.js';
 *
 *   const canvas = new ChartCanvas(container, createConfiguration({ generations: 5 }));
 *   canvas.initialize();
 *   canvas.initializeInteraction(new ChartOverlay(container));
 *
 *   canvas.defs.define('gradient-male', (doc) => ...);
 *   canvas.visual?.appendChild(personNode);
 *
 *   await canvas.export('png').svgToImage(canvas.get(), 'pedigree-chart');
 */

export { ChartCanvas } from './canvas.js';
export type { CanvasState } from './canvas.js';
export { createConfiguration, DEFAULT_CHART_OPTIONS, MIN_GENERATIONS, MAX_GENERATIONS } from './configuration.js';
export type { ChartOptions } from './configuration.js';
export { ChartDefs } from './defs.js';
export { ChartOverlay } from './overlay.js';
export type { HintOverlay } from './overlay.js';
export { DomInteractionSource } from './interaction.js';
export type { InteractionEvent, InteractionEventType, InteractionSource, ListenOptions } from './interaction.js';
export { timeoutScheduler } from './scheduler.js';
export type { ScheduledTask, Scheduler } from './scheduler.js';
export { ChartZoom, MIN_SCALE, MAX_SCALE } from './zoom.js';
export type { ZoomTransform } from './zoom.js';
export { ChartExport, EXPORT_MARGIN } from './export/export.js';
export type { PreparedSvg } from './export/export.js';
export { ExportFactory } from './export/export-factory.js';
export type { ExportCreator } from './export/export-factory.js';
export { PngExport } from './export/png-export.js';
export { SvgExport } from './export/svg-export.js';
export { createSvgElement, SVG_NS, XLINK_NS } from './svg.js';
