/**
 * DisplayRecord builder - turns a source individual into a render-ready record
 */

import { decomposeName, MarkupParser, parseMarkup } from './names/index.js';
import { strings } from './strings.js';
import {
    ColorPair,
    DisplayRecord,
    IndividualSource,
    LifeDate,
    SEX_CODES,
    Sex,
    TreePreferences
} from './types.js';

/** Bounding box the highlight image is fitted into */
export const THUMBNAIL_SIZE = 250;

export interface DisplayRecordContext {
    preferences: TreePreferences;
    /** Base URL the silhouette images are served from */
    assetBaseUrl: string;
    /** Box color, supplied by the caller's coloring logic */
    color?: string;
    parser?: MarkupParser;
}

/**
 * Earliest year the date resolves to, null if it does not resolve
 */
export function minimumYear(date: LifeDate): number | null {
    return date.years.length > 0 ? Math.min(...date.years) : null;
}

/**
 * Short lifespan label shown below the name:
 * "1900-1950", "Born: 1900", "Died: 1950", "Deceased" or ''.
 */
export function lifetimeDescription(birth: LifeDate, death: LifeDate, isDead: boolean): string {
    const birthYear = minimumYear(birth);
    const deathYear = minimumYear(death);

    if (birthYear !== null && deathYear !== null) {
        return `${birthYear}-${deathYear}`;
    }

    if (birthYear !== null) {
        return strings.lifespan.born(String(birthYear));
    }

    if (deathYear !== null) {
        return strings.lifespan.died(String(deathYear));
    }

    if (isDead) {
        return strings.lifespan.deceased;
    }

    return '';
}

export function assetUrl(assetBaseUrl: string, path: string): string {
    return `${assetBaseUrl.replace(/\/+$/, '')}/${path}`;
}

export function silhouetteUrl(assetBaseUrl: string, sex: Sex): string {
    return assetUrl(assetBaseUrl, `images/silhouette-${SEX_CODES[sex]}.svg`);
}

/**
 * URL of the image shown in the person box.
 *
 * Sex-specific silhouettes are only used when the individual is visible and
 * highlight images are enabled; otherwise everybody gets the neutral one.
 */
export function resolveThumbnail(
    individual: Pick<IndividualSource, 'canShow' | 'sex' | 'highlightedMedia'>,
    preferences: TreePreferences,
    assetBaseUrl: string
): string {
    if (individual.canShow && preferences.showHighlightImages) {
        if (individual.highlightedMedia !== null) {
            return individual.highlightedMedia.imageUrl(THUMBNAIL_SIZE, THUMBNAIL_SIZE, 'contain');
        }

        return silhouetteUrl(assetBaseUrl, individual.sex);
    }

    return silhouetteUrl(assetBaseUrl, 'unknown');
}

/**
 * Text content of a markup fragment (dates come formatted as HTML)
 */
export function plainText(markup: string, parser: MarkupParser = parseMarkup): string {
    if (markup.trim() === '') {
        return '';
    }

    try {
        return (parser(markup).body.textContent ?? '').replace(/\s+/g, ' ').trim();
    } catch (error) {
        console.warn('Could not parse date markup:', error);
        return markup.replace(/<[^>]*>/g, '').trim();
    }
}

/**
 * Build the display record of one individual.
 */
export function buildDisplayRecord(
    individual: IndividualSource,
    generation: number,
    context: DisplayRecordContext
): DisplayRecord {
    const parser = context.parser ?? parseMarkup;
    const nameParts = decomposeName(
        individual.primaryName.full,
        individual.primaryName.fullNN,
        individual.alternateName,
        parser
    );

    const colors: ColorPair = [Object.freeze([]), Object.freeze([])];
    Object.freeze(colors);

    const record: DisplayRecord = {
        id: 0,
        xref: individual.xref,
        url: individual.url,
        updateUrl: individual.updateUrl,
        generation,
        ...nameParts,
        firstNames: Object.freeze(nameParts.firstNames),
        lastNames: Object.freeze(nameParts.lastNames),
        alternativeNames: Object.freeze(nameParts.alternativeNames),
        thumbnail: resolveThumbnail(individual, context.preferences, context.assetBaseUrl),
        sex: individual.sex,
        birth: plainText(individual.birth.display, parser),
        death: plainText(individual.death.display, parser),
        timespan: lifetimeDescription(individual.birth, individual.death, individual.isDead),
        color: context.color ?? '',
        colors
    };

    // Shallow freeze; the arrays above are frozen on their own
    return Object.freeze(record);
}
