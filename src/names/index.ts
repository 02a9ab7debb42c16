/**
 * Names Module Entry Point
 */

export {
    decomposeName,
    displayName,
    parseAlternateNames,
    parseNameTree,
    preferredName,
    lastNames,
    firstNames,
    NAME_PLACEHOLDERS
} from './decompose.js';
export type { NameTree } from './decompose.js';
export { isRtl, isRtlText } from './direction.js';
export { parseMarkup, splitWords, textNodes } from './markup.js';
export type { MarkupParser } from './markup.js';
