/**
 * Pedigree Chart - Type Definitions
 * Branded record references, source records and render-ready display records
 */

// ==================== BRANDED TYPES ====================

/** Branded type for record references - prevents mixing with other string IDs */
export type Xref = string & { readonly __brand: 'Xref' };

/** Helper to create an Xref from string */
export function toXref(id: string): Xref {
    return id as Xref;
}

// ==================== SOURCE RECORDS ====================

export type Sex = 'male' | 'female' | 'unknown';

/** Silhouette asset suffix per sex */
export const SEX_CODES: Record<Sex, 'M' | 'F' | 'U'> = {
    male: 'M',
    female: 'F',
    unknown: 'U'
};

/**
 * A birth or death date as supplied by the data source.
 * `display` is formatted markup, `years` every year the date resolves to
 * (empty if the date cannot be resolved).
 */
export interface LifeDate {
    display: string;
    years: readonly number[];
}

export type ImageFit = 'contain' | 'crop';

export interface MediaFile {
    imageUrl(width: number, height: number, fit: ImageFit): string;
}

export interface PersonName {
    /** Formatted full name (HTML) */
    full: string;
    /** Full name without markup, may contain @N.N. / @P.N. placeholders */
    fullNN: string;
}

/**
 * One individual as handed over by the genealogy data source
 */
export interface IndividualSource {
    xref: Xref;
    url: string;
    updateUrl: string;
    sex: Sex;
    /** Visible in the caller's security context */
    canShow: boolean;
    primaryName: PersonName;
    /** Raw alternate-name markup, null if the individual has none */
    alternateName: string | null;
    birth: LifeDate;
    death: LifeDate;
    isDead: boolean;
    highlightedMedia: MediaFile | null;
}

export interface TreePreferences {
    showHighlightImages: boolean;
}

// ==================== DISPLAY RECORDS ====================

/** Gradient color stops for the two halves of a person box */
export type ColorPair = readonly [readonly string[], readonly string[]];

export interface NameParts {
    name: string;
    firstNames: readonly string[];
    lastNames: readonly string[];
    preferredName: string;
    alternativeNames: readonly string[];
    isAltRtl: boolean;
}

/**
 * Render-ready description of one person node.
 * Created once per source record and never mutated afterwards.
 */
export interface DisplayRecord extends NameParts {
    /** Placeholder, assigned by the caller during layout */
    id: number;
    xref: Xref;
    url: string;
    updateUrl: string;
    generation: number;
    thumbnail: string;
    sex: Sex;
    birth: string;
    death: string;
    timespan: string;
    color: string;
    colors: ColorPair;
}

// ==================== CHART ====================

export type LayoutOrientation = 'left-right' | 'right-left' | 'top-bottom' | 'bottom-top';

export const LAYOUT_ORIENTATIONS: readonly LayoutOrientation[] = [
    'left-right',
    'right-left',
    'top-bottom',
    'bottom-top'
];

export type TextDirection = 'ltr' | 'rtl';

export interface ChartLabels {
    /** Hint shown when the wheel is used without the modifier key */
    zoom: string;
    /** Hint shown when a single finger drags on a touch screen */
    move: string;
}

export interface ChartConfiguration {
    readonly rtl: boolean;
    readonly labels: Readonly<ChartLabels>;
    readonly treeLayout: LayoutOrientation;
    readonly generations: number;
    readonly assetBaseUrl: string;
}

export type ExportFormat = 'png' | 'svg';
