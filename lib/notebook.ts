import fs from 'fs';
import { MalformedInputError } from './errors';
import { logger } from './logger';
import { NotebookSchema, type Cell, type Notebook, type SanitizeOptionsInput } from './schema';
import { sanitizeSource } from './source';

export interface NotebookReport {
    changedCells: number;
    replacements: number;
}

export interface SanitizedNotebook extends NotebookReport {
    notebook: Notebook;
}

export function parseNotebook(json: string, origin: string): Notebook {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error) {
        throw new MalformedInputError(origin, [error instanceof Error ? error.message : String(error)]);
    }

    const result = NotebookSchema.safeParse(raw);
    if (!result.success) {
        throw new MalformedInputError(
            origin,
            result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        );
    }
    return result.data;
}

export function serializeNotebook(notebook: Notebook): string {
    return JSON.stringify(notebook, null, 1) + '\n';
}

/**
 * Sanitizes every markdown cell. Code and raw cells pass through as they
 * are; the input notebook is not modified.
 */
export function sanitizeNotebook(notebook: Notebook, options: SanitizeOptionsInput = {}): SanitizedNotebook {
    if (!notebook.cells) {
        return { notebook, changedCells: 0, replacements: 0 };
    }

    let changedCells = 0;
    let replacements = 0;

    const cells = notebook.cells.map((cell, index): Cell => {
        if (cell.cell_type !== 'markdown') return cell;

        const result = sanitizeSource(cell.source, options);
        replacements += result.replacements;
        if (!result.changed) return cell;

        changedCells++;
        logger.debug('CellSanitized', { cellIndex: index, replacements: result.replacements });
        return { ...cell, source: result.source };
    });

    return { notebook: { ...notebook, cells }, changedCells, replacements };
}

export function sanitizeNotebookFile(
    inputPath: string,
    outputPath: string,
    options: SanitizeOptionsInput = {},
): NotebookReport {
    const raw = fs.readFileSync(inputPath, 'utf8');
    const { notebook, changedCells, replacements } = sanitizeNotebook(parseNotebook(raw, inputPath), options);

    fs.writeFileSync(outputPath, serializeNotebook(notebook), 'utf8');

    if (changedCells > 0) {
        logger.info('NotebookSanitized', { input: inputPath, output: outputPath, changedCells, replacements });
    } else {
        logger.info('NotebookCopied', { input: inputPath, output: outputPath });
    }

    return { changedCells, replacements };
}
