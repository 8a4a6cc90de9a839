import { sanitizeText } from './latex-sanitizer';
import type { CellSource, SanitizeOptionsInput } from './schema';

/**
 * How a list-shaped cell source carries its line breaks:
 * - `attached`: `["a\n", "b\n"]`, the shape nbformat writes.
 * - `detached`: `["a", "\n", "b", "\n"]`, every newline its own fragment.
 */
export type SourceLayout = 'attached' | 'detached';

export interface SourceResult {
    source: CellSource;
    changed: boolean;
    replacements: number;
}

export function joinSource(source: CellSource): string {
    return typeof source === 'string' ? source : source.join('');
}

export function detectLayout(fragments: readonly string[]): SourceLayout {
    const bareNewline = fragments.some((fragment) => fragment === '\n');
    const attachedNewline = fragments.some((fragment) => fragment !== '\n' && fragment.includes('\n'));
    return bareNewline && !attachedNewline ? 'detached' : 'attached';
}

/** Splits `text` into fragments whose concatenation is exactly `text`. */
export function splitLines(text: string, layout: SourceLayout = 'attached'): string[] {
    if (layout === 'detached') {
        return text.split(/(\n)/).filter((fragment) => fragment !== '');
    }
    return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export function reshapeSource(original: CellSource, text: string): CellSource {
    if (typeof original === 'string') return text;
    return splitLines(text, detectLayout(original));
}

/**
 * Sanitizes one cell's source. An unchanged source comes back as the very
 * same value so its fragment boundaries survive untouched.
 */
export function sanitizeSource(source: CellSource, options: SanitizeOptionsInput = {}): SourceResult {
    const text = joinSource(source);
    const { sanitized, replacements } = sanitizeText(text, options);

    if (sanitized === text) {
        return { source, changed: false, replacements };
    }

    return { source: reshapeSource(source, sanitized), changed: true, replacements };
}
