/**
 * Characters that XeLaTeX either rejects or typesets as garbage with the
 * default nbconvert template, mapped to ASCII stand-ins.
 */
export const UNICODE_REPLACEMENTS: Readonly<Record<string, string>> = {
    '\u00A0': ' ',   // no-break space
    '\u2018': "'",   // left single quote
    '\u2019': "'",   // right single quote
    '\u201C': '"',   // left double quote
    '\u201D': '"',   // right double quote
    '\u2013': '-',   // en dash
    '\u2014': '-',   // em dash
    '\u2026': '...', // ellipsis
    '\u2192': '->',
    '\u21D2': '=>',
    '\u21A6': '|->',
    '\u2212': '-',   // minus sign
    '\u200B': '',    // zero-width space
    '\u200C': '',    // zero-width non-joiner
    '\u200D': '',    // zero-width joiner
    '\uFEFF': '',    // zero-width no-break space (BOM)
};

const UNICODE_PATTERN = new RegExp(`[${Object.keys(UNICODE_REPLACEMENTS).join('')}]`, 'g');

export function normalizeUnicode(text: string): string {
    if (!text) return text;
    return text.replace(UNICODE_PATTERN, (ch) => UNICODE_REPLACEMENTS[ch] ?? ch);
}

export function countUnicodeReplacements(text: string): number {
    return text.match(UNICODE_PATTERN)?.length ?? 0;
}
