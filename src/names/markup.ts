/**
 * Markup parsing for formatted name fragments
 */

import { MarkupParseError } from '../errors.js';

/** Turns an HTML fragment into a document whose body holds the fragment */
export type MarkupParser = (markup: string) => Document;

/**
 * Default parser backed by the host's DOMParser.
 */
export function parseMarkup(markup: string): Document {
    if (typeof DOMParser === 'undefined') {
        throw new MarkupParseError('DOMParser is not available in this environment');
    }

    try {
        return new DOMParser().parseFromString(markup, 'text/html');
    } catch (error) {
        throw new MarkupParseError('Could not parse name markup', { cause: error });
    }
}

function isText(node: Node): node is Text {
    return node.nodeType === Node.TEXT_NODE;
}

/**
 * All text nodes below root, in document order.
 */
export function textNodes(root: Element): Text[] {
    const walker = root.ownerDocument.createTreeWalker(root, NodeFilter.SHOW_TEXT);
    const nodes: Text[] = [];

    for (let node = walker.nextNode(); node; node = walker.nextNode()) {
        if (isText(node)) {
            nodes.push(node);
        }
    }

    return nodes;
}

/**
 * Join text fragments and re-split them into single words.
 * Each fragment is trimmed first; empty words are dropped.
 */
export function splitWords(fragments: readonly string[]): string[] {
    return fragments
        .map(fragment => fragment.trim())
        .join(' ')
        .split(/\s+/)
        .filter(word => word !== '');
}
