import fs from 'fs';
import path from 'path';
import { sanitizeText } from './latex-sanitizer';
import { logger } from './logger';
import { sanitizeNotebookFile } from './notebook';
import type { SanitizeOptionsInput } from './schema';

export interface SanitizeFileReport {
    format: 'notebook' | 'text';
    changed: boolean;
    replacements: number;
}

/** Markdown or LaTeX: the whole file is a single source text. */
export function sanitizeTextFile(
    inputPath: string,
    outputPath: string,
    options: SanitizeOptionsInput = {},
): SanitizeFileReport {
    const raw = fs.readFileSync(inputPath, 'utf8');
    const { sanitized, replacements } = sanitizeText(raw, options);

    fs.writeFileSync(outputPath, sanitized, 'utf8');
    logger.info('TextSanitized', { input: inputPath, output: outputPath, replacements });

    return { format: 'text', changed: sanitized !== raw, replacements };
}

export function sanitizeFile(
    inputPath: string,
    outputPath: string,
    options: SanitizeOptionsInput = {},
): SanitizeFileReport {
    if (path.extname(inputPath).toLowerCase() === '.ipynb') {
        const { changedCells, replacements } = sanitizeNotebookFile(inputPath, outputPath, options);
        return { format: 'notebook', changed: changedCells > 0, replacements };
    }
    return sanitizeTextFile(inputPath, outputPath, options);
}
