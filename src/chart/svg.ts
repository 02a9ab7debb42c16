/**
 * SVG element helpers
 */

export const SVG_NS = 'http://www.w3.org/2000/svg';
export const XLINK_NS = 'http://www.w3.org/1999/xlink';

export function createSvgElement<K extends keyof SVGElementTagNameMap>(
    doc: Document,
    tag: K
): SVGElementTagNameMap[K] {
    return doc.createElementNS(SVG_NS, tag);
}
