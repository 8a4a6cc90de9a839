import { z } from 'zod';
import type { SanitizeOptions } from './schema';

const booleanFlag = (fallback: 'true' | 'false') =>
    z.enum(['true', 'false', '1', '0'])
        .default(fallback)
        .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    // Sanitizer defaults; CLI flags override these per run
    SANITIZE_NORMALIZE_UNICODE: booleanFlag('true'),
    SANITIZE_NORMALIZE_MATH_DELIMITERS: booleanFlag('false'),
    SANITIZE_ESCAPE_UNDERSCORES: booleanFlag('false'),

    // PDF metadata - title falls back to the file's base name
    PDF_TITLE: z.string().min(1).optional(),
    PDF_AUTHOR: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
    const result = envSchema.safeParse(source);
    if (result.success) return result.data;

    console.error('Invalid environment variables:');
    result.error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    });

    if (source.NODE_ENV === 'production') {
        throw new Error('Invalid environment configuration. See logs for details.');
    }

    // Only the offending variables fall back; valid ones still apply
    const invalid = new Set(result.error.issues.map((issue) => String(issue.path[0])));
    const valid = Object.fromEntries(Object.entries(source).filter(([key]) => !invalid.has(key)));
    console.warn(`Falling back to defaults for ${[...invalid].join(', ')}`);
    return envSchema.parse(valid);
}

export function optionsFromEnv(config: Env): SanitizeOptions {
    return {
        normalizeUnicode: config.SANITIZE_NORMALIZE_UNICODE,
        normalizeMathDelimiters: config.SANITIZE_NORMALIZE_MATH_DELIMITERS,
        escapeUnderscores: config.SANITIZE_ESCAPE_UNDERSCORES,
    };
}

export const env = loadEnv();
