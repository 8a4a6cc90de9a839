import fs from 'fs';
import { logger } from './logger';
import type { PdfMetadata } from './schema';

export const HYPERSETUP_ANCHOR = '\\hypersetup{';

export type PdfMetadataStatus = 'patched' | 'already-present' | 'anchor-not-found';

export interface PdfMetadataResult {
    content: string;
    status: PdfMetadataStatus;
}

export function metadataLines({ title, author }: PdfMetadata): string {
    return `\n      pdftitle={${title}},\n      pdfauthor={${author}},\n`;
}

/**
 * Inserts pdftitle/pdfauthor right after the first `\hypersetup{`.
 * A missing anchor is not an error: the document is returned as is.
 */
export function patchPdfMetadata(tex: string, metadata: PdfMetadata): PdfMetadataResult {
    if (tex.includes(`pdftitle={${metadata.title}}`)) {
        return { content: tex, status: 'already-present' };
    }

    const index = tex.indexOf(HYPERSETUP_ANCHOR);
    if (index === -1) {
        return { content: tex, status: 'anchor-not-found' };
    }

    const insertAt = index + HYPERSETUP_ANCHOR.length;
    return {
        content: tex.slice(0, insertAt) + metadataLines(metadata) + tex.slice(insertAt),
        status: 'patched',
    };
}

export function fixPdfMetadataFile(texPath: string, metadata: PdfMetadata): PdfMetadataStatus {
    const tex = fs.readFileSync(texPath, 'utf8');
    const { content, status } = patchPdfMetadata(tex, metadata);

    switch (status) {
        case 'patched':
            fs.writeFileSync(texPath, content, 'utf8');
            logger.info('PdfMetadataAdded', { input: texPath, title: metadata.title });
            break;
        case 'already-present':
            logger.info('PdfMetadataPresent', { input: texPath });
            break;
        case 'anchor-not-found':
            logger.info('PdfMetadataAnchorMissing', { input: texPath, anchor: HYPERSETUP_ANCHOR });
            break;
    }

    return status;
}
