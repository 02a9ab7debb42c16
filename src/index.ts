/**
 * Pedigree chart core
 *
 * - names/:  name parts from formatted name markup
 * - display-record: render-ready records for the chart nodes
 * - chart/:  the interactive SVG canvas the chart is drawn onto
 */

export * from './types.js';
export * from './errors.js';
export * from './names/index.js';
export * from './chart/index.js';
export {
    buildDisplayRecord,
    lifetimeDescription,
    minimumYear,
    resolveThumbnail,
    silhouetteUrl,
    assetUrl,
    plainText,
    THUMBNAIL_SIZE
} from './display-record.js';
export type { DisplayRecordContext } from './display-record.js';
export { strings, setLanguage } from './strings.js';
export type { Language } from './strings.js';
