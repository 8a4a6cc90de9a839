export type RegionKind =
    | 'CODE_FENCE'
    | 'CODE_INLINE'
    | 'MATH_DISPLAY'
    | 'MATH_INLINE'
    | 'PROSE';

export interface Region {
    kind: RegionKind;
    start: number;
    end: number;
    /** Full span, delimiters included. */
    text: string;
    open: string;
    close: string;
}

interface Delimiter {
    kind: Exclude<RegionKind, 'PROSE'>;
    open: string;
    close: string;
}

// Priority order: when two openers start at the same offset the earlier entry wins.
const DELIMITERS: readonly Delimiter[] = [
    { kind: 'CODE_FENCE', open: '```', close: '```' },
    { kind: 'CODE_INLINE', open: '`', close: '`' },
    { kind: 'MATH_DISPLAY', open: '\\[', close: '\\]' },
    { kind: 'MATH_DISPLAY', open: '$$', close: '$$' },
    { kind: 'MATH_INLINE', open: '\\(', close: '\\)' },
    { kind: 'MATH_INLINE', open: '$', close: '$' },
];

/**
 * Next occurrence of `token` at or after `from`. A dollar sign written as
 * `\$` is a literal and never counts as a delimiter.
 */
function findToken(text: string, token: string, from: number): number {
    let index = text.indexOf(token, from);
    while (index > 0 && token.startsWith('$') && text[index - 1] === '\\') {
        index = text.indexOf(token, index + 1);
    }
    return index;
}

/**
 * Inline code closes on the same line, on a backtick that is not part of a
 * longer run, so a stray backtick never reaches into a fence.
 */
function findInlineCodeCloser(text: string, from: number): number {
    for (let i = from; i < text.length; i++) {
        if (text[i] === '\n') return -1;
        if (text[i] === '`' && text[i - 1] !== '`' && text[i + 1] !== '`') return i;
    }
    return -1;
}

function findCloser(text: string, delimiter: Delimiter, from: number): number {
    if (delimiter.kind === 'CODE_INLINE') return findInlineCodeCloser(text, from);
    return findToken(text, delimiter.close, from);
}

function findNextOpener(text: string, from: number): { delimiter: Delimiter; index: number } | null {
    let best: { delimiter: Delimiter; index: number } | null = null;
    for (const delimiter of DELIMITERS) {
        const index = findToken(text, delimiter.open, from);
        if (index !== -1 && (best === null || index < best.index)) {
            best = { delimiter, index };
        }
    }
    return best;
}

function pushProse(regions: Region[], text: string, start: number, end: number) {
    if (start >= end) return;
    regions.push({ kind: 'PROSE', start, end, text: text.slice(start, end), open: '', close: '' });
}

/**
 * Splits markdown into code, math and prose regions, left to right.
 *
 * The result is disjoint and covers the whole input. An unclosed fence turns
 * the rest of the text into prose; any other unclosed opener stays in the
 * surrounding prose and scanning continues after it.
 */
export function classifyRegions(text: string): Region[] {
    const regions: Region[] = [];
    let proseStart = 0;
    let cursor = 0;

    while (cursor < text.length) {
        const next = findNextOpener(text, cursor);
        if (!next) break;

        const { delimiter, index } = next;
        const closeIndex = findCloser(text, delimiter, index + delimiter.open.length);

        if (closeIndex === -1) {
            if (delimiter.kind === 'CODE_FENCE') break;
            cursor = index + delimiter.open.length;
            continue;
        }

        const end = closeIndex + delimiter.close.length;
        pushProse(regions, text, proseStart, index);
        regions.push({
            kind: delimiter.kind,
            start: index,
            end,
            text: text.slice(index, end),
            open: delimiter.open,
            close: delimiter.close,
        });
        cursor = end;
        proseStart = end;
    }

    pushProse(regions, text, proseStart, text.length);
    return regions;
}

export function isMath(region: Region): boolean {
    return region.kind === 'MATH_DISPLAY' || region.kind === 'MATH_INLINE';
}
