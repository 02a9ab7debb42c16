/**
 * Script direction detection for alternate names
 */

// Hebrew, Arabic, Syriac, Thaana, N'Ko, Samaritan, Mandaic, their presentation
// forms and the historic RTL scripts of the supplementary planes
const RTL_SCRIPT = /[\u0590-\u08FF\uFB1D-\uFDFF\uFE70-\uFEFF\u{10800}-\u{10FFF}\u{1E800}-\u{1EFFF}]/u;
const LETTER = /\p{L}/u;

/**
 * True if the first strongly directional character (a letter) is written
 * right-to-left. Digits, punctuation and marks are skipped.
 */
export function isRtlText(text: string): boolean {
    for (const char of text) {
        if (LETTER.test(char)) {
            return RTL_SCRIPT.test(char);
        }
    }

    return false;
}

export function isRtl(names: readonly string[]): boolean {
    return isRtlText(names.join(' '));
}
