/**
 * Chart Strings - Multi-language support for labels produced by the chart core
 */

export type Language = 'en' | 'cs';

// Type definition for strings structure
type StringsType = typeof stringsEN;

const stringsEN = {
    // Hints shown over the chart
    chart: {
        zoomHint: 'Use Ctrl + scroll to zoom the chart',
        moveHint: 'Use two fingers to move the chart'
    },

    // Timespan labels below the name
    lifespan: {
        born: (year: string) => `Born: ${year}`,
        died: (year: string) => `Died: ${year}`,
        deceased: 'Deceased'
    },

    export: {
        failed: 'Export failed'
    }
};

const stringsCZ: StringsType = {
    chart: {
        zoomHint: 'Graf přiblížíte pomocí Ctrl + kolečka myši',
        moveHint: 'Graf posunete dvěma prsty'
    },

    lifespan: {
        born: (year: string) => `Narozen(a): ${year}`,
        died: (year: string) => `Zemřel(a): ${year}`,
        deceased: 'Zesnulý(á)'
    },

    export: {
        failed: 'Export se nezdařil'
    }
};

const languagePacks: Record<Language, StringsType> = {
    en: stringsEN,
    cs: stringsCZ
};

// Active pack, replaced by setLanguage()
export let strings: StringsType = stringsEN;

/**
 * Switch every label the chart core produces to another language.
 * Configurations created earlier keep the labels they were built with.
 */
export function setLanguage(lang: Language): void {
    strings = languagePacks[lang];
}
