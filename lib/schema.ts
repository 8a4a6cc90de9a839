import { z } from 'zod';

export const SanitizeOptionsSchema = z.object({
    normalizeUnicode: z.boolean().default(true),
    // Off by default: nbconvert handles \( \) and \[ \] itself.
    normalizeMathDelimiters: z.boolean().default(false),
    escapeUnderscores: z.boolean().default(false),
});

export const CellSourceSchema = z.union([
    z.string(),
    z.array(z.string()),
]);

export const CellSchema = z.object({
    cell_type: z.string(),
    source: CellSourceSchema,
}).passthrough();

export const NotebookSchema = z.object({
    cells: z.array(CellSchema).optional(),
}).passthrough();

export const PdfMetadataSchema = z.object({
    title: z.string(),
    author: z.string().default(''),
});

export type SanitizeOptions = z.infer<typeof SanitizeOptionsSchema>;
export type SanitizeOptionsInput = z.input<typeof SanitizeOptionsSchema>;
export type CellSource = z.infer<typeof CellSourceSchema>;
export type Cell = z.infer<typeof CellSchema>;
export type Notebook = z.infer<typeof NotebookSchema>;
export type PdfMetadata = z.infer<typeof PdfMetadataSchema>;
