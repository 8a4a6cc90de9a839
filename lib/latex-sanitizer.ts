import { classifyRegions, isMath, type Region } from './regions';
import { SanitizeOptionsSchema, type SanitizeOptions, type SanitizeOptionsInput } from './schema';
import { countUnicodeReplacements, normalizeUnicode } from './unicode';

export interface SanitizeResult {
    sanitized: string;
    replacements: number;
}

const DOLLAR_SPELLING: Readonly<Record<string, string>> = {
    '\\[': '$$',
    '\\]': '$$',
    '\\(': '$',
    '\\)': '$',
};

const BRACKET_DELIMITER = /\\[[\]()]/g;
const UNESCAPED_UNDERSCORE = /(?<!\\)_/g;

// Replacement callbacks keep `$` literal; a replacement string would read `$$` as an escape.
function replaceWithCount(text: string, regex: RegExp, replace: (match: string) => string): SanitizeResult {
    let replacements = 0;
    const sanitized = text.replace(regex, (match) => {
        replacements++;
        return replace(match);
    });
    return { sanitized, replacements };
}

/** `\[ \]` become `$$`, `\( \)` become `$`. */
export function normalizeMathDelimiters(text: string): string {
    return replaceWithCount(text, BRACKET_DELIMITER, (match) => DOLLAR_SPELLING[match] ?? match).sanitized;
}

/** Escapes bare underscores; `\_` is left alone so the rewrite can run twice. */
export function escapeUnderscores(text: string): string {
    return replaceWithCount(text, UNESCAPED_UNDERSCORE, () => '\\_').sanitized;
}

function rewriteProse(text: string, options: SanitizeOptions): SanitizeResult {
    if (!options.escapeUnderscores) return { sanitized: text, replacements: 0 };
    return replaceWithCount(text, UNESCAPED_UNDERSCORE, () => '\\_');
}

function respellMath(region: Region): SanitizeResult {
    if (DOLLAR_SPELLING[region.open] === undefined || DOLLAR_SPELLING[region.close] === undefined) {
        return { sanitized: region.text, replacements: 0 };
    }
    const body = region.text.slice(region.open.length, region.text.length - region.close.length);
    return {
        sanitized: `${normalizeMathDelimiters(region.open)}${body}${normalizeMathDelimiters(region.close)}`,
        replacements: 2,
    };
}

function rewriteRegion(region: Region, options: SanitizeOptions): SanitizeResult {
    if (region.kind === 'PROSE') return rewriteProse(region.text, options);
    if (isMath(region) && options.normalizeMathDelimiters) return respellMath(region);
    return { sanitized: region.text, replacements: 0 };
}

function rewriteOnce(text: string, options: SanitizeOptions): SanitizeResult {
    let sanitized = '';
    let replacements = 0;
    for (const region of classifyRegions(text)) {
        const result = rewriteRegion(region, options);
        sanitized += result.sanitized;
        replacements += result.replacements;
    }
    return { sanitized, replacements };
}

/**
 * Prepares markdown for XeLaTeX. Unicode fixes apply everywhere, code and
 * math included; underscore escaping only touches prose, and delimiter
 * normalization only the delimiters (never the body) of bracket-style math.
 *
 * The result is a fixed point: classifying it again finds nothing left to
 * rewrite, so a second run returns it unchanged.
 */
export function sanitizeText(text: string, options: SanitizeOptionsInput = {}): SanitizeResult {
    if (!text) return { sanitized: text, replacements: 0 };

    const config = SanitizeOptionsSchema.parse(options);
    let replacements = 0;
    let sanitized = text;

    if (config.normalizeUnicode) {
        replacements += countUnicodeReplacements(text);
        sanitized = normalizeUnicode(text);
    }

    if (!config.normalizeMathDelimiters && !config.escapeUnderscores) {
        return { sanitized, replacements };
    }

    // A re-spelled `$` can pair with a different dollar on the next scan
    // (`$x\(y_1\)` becomes `$x$y_1$`). Each pass removes bracket delimiters or
    // bare underscores and adds neither, so this stops.
    for (;;) {
        const pass = rewriteOnce(sanitized, config);
        if (pass.replacements === 0) break;
        sanitized = pass.sanitized;
        replacements += pass.replacements;
    }

    return { sanitized, replacements };
}

export function sanitize(text: string, options: SanitizeOptionsInput = {}): string {
    return sanitizeText(text, options).sanitized;
}
