import path from 'path';
import { parseArgs } from 'util';
import { env, optionsFromEnv, type Env } from './env';
import { UsageError } from './errors';
import { sanitizeFile } from './files';
import { logger } from './logger';
import { fixPdfMetadataFile } from './pdf-metadata';
import { PdfMetadataSchema, type SanitizeOptions } from './schema';

export interface CliIo {
    out: (line: string) => void;
    err: (line: string) => void;
}

const consoleIo: CliIo = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
};

export const USAGE = [
    'Usage:',
    '  sanitize <input> <output> [--normalize-math] [--escape-underscores] [--no-unicode]',
    '  fix-metadata <file> [--title <title>] [--author <author>]',
].join('\n');

const SANITIZE_OPTIONS = {
    'normalize-math': { type: 'boolean' },
    'escape-underscores': { type: 'boolean' },
    'no-unicode': { type: 'boolean' },
} as const;

const METADATA_OPTIONS = {
    title: { type: 'string' },
    author: { type: 'string' },
} as const;

// parseArgs throws a TypeError for unknown or malformed flags
function asUsage<T>(parse: () => T): T {
    try {
        return parse();
    } catch (error) {
        throw new UsageError(error instanceof Error ? error.message : String(error));
    }
}

function runSanitize(args: string[], io: CliIo, config: Env): number {
    const { values, positionals } = asUsage(() => parseArgs({ args, options: SANITIZE_OPTIONS, allowPositionals: true }));
    const [input, output] = positionals;
    if (positionals.length !== 2 || !input || !output) {
        throw new UsageError('sanitize expects <input> <output>');
    }

    const defaults = optionsFromEnv(config);
    const options: SanitizeOptions = {
        normalizeUnicode: values['no-unicode'] ? false : defaults.normalizeUnicode,
        normalizeMathDelimiters: values['normalize-math'] ?? defaults.normalizeMathDelimiters,
        escapeUnderscores: values['escape-underscores'] ?? defaults.escapeUnderscores,
    };

    const report = sanitizeFile(input, output, options);
    io.out(report.changed
        ? `Sanitized ${input} -> ${output} (${report.replacements} replacements)`
        : `Copied ${input} -> ${output} (no changes needed)`);
    return 0;
}

function runFixMetadata(args: string[], io: CliIo, config: Env): number {
    const { values, positionals } = asUsage(() => parseArgs({ args, options: METADATA_OPTIONS, allowPositionals: true }));
    const [file] = positionals;
    if (positionals.length !== 1 || !file) {
        throw new UsageError('fix-metadata expects <file>');
    }

    const metadata = PdfMetadataSchema.parse({
        title: values.title ?? config.PDF_TITLE ?? path.parse(file).name,
        author: values.author ?? config.PDF_AUTHOR,
    });

    switch (fixPdfMetadataFile(file, metadata)) {
        case 'patched':
            io.out(`Added PDF metadata to ${file}`);
            break;
        case 'already-present':
            io.out(`PDF metadata already present in ${file}`);
            break;
        case 'anchor-not-found':
            io.out(`No \\hypersetup{ in ${file}; metadata not added`);
            break;
    }
    return 0;
}

/** Runs one command and returns the process exit code. */
export function runCli(argv: string[], io: CliIo = consoleIo, config: Env = env): number {
    const [command, ...rest] = argv;

    try {
        switch (command) {
            case 'sanitize':
                return runSanitize(rest, io, config);
            case 'fix-metadata':
                return runFixMetadata(rest, io, config);
            default:
                throw new UsageError(command ? `Unknown command: ${command}` : 'Missing command');
        }
    } catch (error) {
        if (error instanceof UsageError) {
            io.err(error.message);
            io.err(USAGE);
            return 1;
        }

        const message = error instanceof Error ? error.message : String(error);
        logger.error('CommandFailed', { command, error: message });
        io.err(`Error: ${message}`);
        return 2;
    }
}
