/**
 * Name decomposition - extracts name parts from a formatted full name
 *
 * The formatted name is an HTML fragment such as
 *
 *   <span class="NAME">Johann <span class="starredname">Karl</span>
 *   <q class="wt-nickname">Charlie</q> <span class="SURN">Müller</span></span>
 *
 * Parts are found by structural queries over the parsed fragment. The queries
 * run in a fixed order (preferred, last, first, alternate) because the
 * first-name query only sees text nodes the last-name query left unclaimed.
 */

import { NameParts } from '../types.js';
import { isRtl } from './direction.js';
import { MarkupParser, parseMarkup, splitWords, textNodes } from './markup.js';

const SURNAME_SELECTOR = 'span.SURN';
const NICKNAME_SELECTOR = '.wt-nickname';
const PREFERRED_SELECTOR = 'span.starredname';
const ALTERNATE_SELECTOR = '[class*="NAME"]';

/** Stand-ins for an unknown given name / surname in the flat name */
export const NAME_PLACEHOLDERS = ['@N.N.', '@P.N.'] as const;

/**
 * Parsed full name with the set of text nodes already assigned to a part
 */
export interface NameTree {
    body: HTMLElement;
    claimed: Set<Text>;
}

export function parseNameTree(markup: string, parser: MarkupParser = parseMarkup): NameTree {
    return { body: parser(markup).body, claimed: new Set() };
}

function isNickname(node: Text): boolean {
    return node.parentElement?.closest(NICKNAME_SELECTOR) != null;
}

function hasContent(node: Text): boolean {
    return (node.nodeValue ?? '').trim() !== '';
}

/**
 * True if node comes before element in document order and is not inside it
 */
function precedes(node: Node, element: Element): boolean {
    return (node.compareDocumentPosition(element) & Node.DOCUMENT_POSITION_FOLLOWING) !== 0;
}

function nameTextNodes(tree: NameTree): Text[] {
    return textNodes(tree.body).filter(hasContent);
}

/**
 * The last surname span; text before it is given names, text inside or
 * after it is surname
 */
function lastSurname(tree: NameTree): Element | null {
    const surnames = tree.body.querySelectorAll(SURNAME_SELECTOR);
    return surnames.length > 0 ? surnames[surnames.length - 1] : null;
}

/**
 * Surname words: non-nickname text not followed by a surname span, so the
 * last surname, a trailing suffix and anything after it. Without a surname
 * span the whole name counts as surname. Claims the nodes it returns.
 */
export function lastNames(tree: NameTree): string[] {
    const surname = lastSurname(tree);
    const nodes = nameTextNodes(tree)
        .filter(node => !isNickname(node) && (!surname || !precedes(node, surname)));

    nodes.forEach(node => tree.claimed.add(node));

    return splitWords(nodes.map(node => node.nodeValue ?? ''));
}

/**
 * Given-name words: unclaimed text followed by a surname span. Earlier
 * surname spans and nicknames in front of the last surname land here too.
 * Must run after lastNames().
 */
export function firstNames(tree: NameTree): string[] {
    const surname = lastSurname(tree);
    if (!surname) return [];

    const nodes = nameTextNodes(tree).filter(node => !tree.claimed.has(node) && precedes(node, surname));

    nodes.forEach(node => tree.claimed.add(node));

    return splitWords(nodes.map(node => node.nodeValue ?? ''));
}

/**
 * Words of the alternate (e.g. foreign script) name.
 * Throws MarkupParseError if the fragment cannot be parsed at all.
 */
export function parseAlternateNames(markup: string | null, parser: MarkupParser = parseMarkup): string[] {
    if (markup === null || markup.trim() === '') {
        return [];
    }

    const body = parser(markup).body;
    const element = body.querySelector(ALTERNATE_SELECTOR) ?? body;

    return splitWords([element.textContent ?? '']);
}

/**
 * Plain-text full name without the unknown-name placeholders.
 */
export function displayName(fullNameFlat: string): string {
    let name = fullNameFlat;
    for (const placeholder of NAME_PLACEHOLDERS) {
        name = name.split(placeholder).join('');
    }
    return name.replace(/\s+/g, ' ').trim();
}

function alternateNamesOrEmpty(markup: string | null, parser: MarkupParser): string[] {
    try {
        return parseAlternateNames(markup, parser);
    } catch (error) {
        console.warn('Ignoring unparseable alternate name:', error);
        return [];
    }
}

/**
 * Split a formatted full name into its parts.
 * Never throws; parts that cannot be determined come back empty.
 */
export function decomposeName(
    fullNameMarkup: string,
    fullNameFlat: string,
    alternateNameMarkup: string | null,
    parser: MarkupParser = parseMarkup
): NameParts {
    let preferred = '';
    let last: string[] = [];
    let first: string[] = [];

    try {
        const tree = parseNameTree(fullNameMarkup, parser);

        // Do not change the order, see lastNames() / firstNames()
        preferred = preferredName(tree);
        last = lastNames(tree);
        first = firstNames(tree);
    } catch (error) {
        console.warn('Could not parse name markup:', error);
    }

    const alternativeNames = alternateNamesOrEmpty(alternateNameMarkup, parser);

    return {
        name: displayName(fullNameFlat),
        firstNames: first,
        lastNames: last,
        preferredName: preferred,
        alternativeNames,
        isAltRtl: isRtl(alternativeNames)
    };
}
