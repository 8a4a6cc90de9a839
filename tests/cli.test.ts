import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { runCli, USAGE, type CliIo } from '@/lib/cli';
import { loadEnv } from '@/lib/env';

const DEFAULTS = loadEnv({});

function capture() {
    const out: string[] = [];
    const err: string[] = [];
    const io: CliIo = {
        out: (line) => out.push(line),
        err: (line) => err.push(line),
    };
    return { io, out, err };
}

describe('lib/cli.ts', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('usage errors', () => {
        it('requires a command', () => {
            const { io, err } = capture();
            expect(runCli([], io, DEFAULTS)).toBe(1);
            expect(err).toEqual(['Missing command', USAGE]);
        });

        it('rejects an unknown command', () => {
            const { io, err } = capture();
            expect(runCli(['convert'], io, DEFAULTS)).toBe(1);
            expect(err[0]).toBe('Unknown command: convert');
        });

        it('requires both paths for sanitize', () => {
            const { io, err } = capture();
            expect(runCli(['sanitize', 'only.ipynb'], io, DEFAULTS)).toBe(1);
            expect(err[0]).toBe('sanitize expects <input> <output>');
        });

        it('rejects unknown flags', () => {
            const { io } = capture();
            expect(runCli(['sanitize', 'a', 'b', '--bogus'], io, DEFAULTS)).toBe(1);
        });

        it('requires exactly one file for fix-metadata', () => {
            const { io, err } = capture();
            expect(runCli(['fix-metadata'], io, DEFAULTS)).toBe(1);
            expect(err[0]).toBe('fix-metadata expects <file>');
        });
    });

    describe('sanitize', () => {
        it('sanitizes a notebook', () => {
            const input = path.join(dir, 'in.ipynb');
            const output = path.join(dir, 'out.ipynb');
            fs.writeFileSync(input, JSON.stringify({
                cells: [{ cell_type: 'markdown', source: ['Costs \u2014 a lot\n', 'see \\(x\\)'] }],
            }));

            const { io, out } = capture();
            expect(runCli(['sanitize', input, output], io, DEFAULTS)).toBe(0);
            expect(out).toEqual([`Sanitized ${input} -> ${output} (1 replacements)`]);

            const written = JSON.parse(fs.readFileSync(output, 'utf8'));
            expect(written.cells[0].source).toEqual(['Costs - a lot\n', 'see \\(x\\)']);
        });

        it('reports a copy when nothing changes', () => {
            const input = path.join(dir, 'in.md');
            const output = path.join(dir, 'out.md');
            fs.writeFileSync(input, 'nothing to fix');

            const { io, out } = capture();
            expect(runCli(['sanitize', input, output], io, DEFAULTS)).toBe(0);
            expect(out).toEqual([`Copied ${input} -> ${output} (no changes needed)`]);
            expect(fs.readFileSync(output, 'utf8')).toBe('nothing to fix');
        });

        it('lets flags enable the prose rules', () => {
            const input = path.join(dir, 'in.md');
            const output = path.join(dir, 'out.md');
            fs.writeFileSync(input, 'a_b \\(x_1\\) `c_d`');

            const { io } = capture();
            expect(runCli(['sanitize', input, output, '--normalize-math', '--escape-underscores'], io, DEFAULTS)).toBe(0);
            expect(fs.readFileSync(output, 'utf8')).toBe('a\\_b $x_1$ `c_d`');
        });

        it('takes defaults from the environment configuration', () => {
            const input = path.join(dir, 'in.md');
            const output = path.join(dir, 'out.md');
            fs.writeFileSync(input, '\\(x\\) \u2014 y');

            const config = loadEnv({ SANITIZE_NORMALIZE_MATH_DELIMITERS: 'true' });
            const { io } = capture();
            expect(runCli(['sanitize', input, output, '--no-unicode'], io, config)).toBe(0);
            expect(fs.readFileSync(output, 'utf8')).toBe('$x$ \u2014 y');
        });

        it('exits with 2 when the input cannot be processed', () => {
            vi.spyOn(console, 'error').mockImplementation(() => {});
            const input = path.join(dir, 'broken.ipynb');
            const output = path.join(dir, 'out.ipynb');
            fs.writeFileSync(input, 'not json');

            const { io, err } = capture();
            expect(runCli(['sanitize', input, output], io, DEFAULTS)).toBe(2);
            expect(err[0].startsWith(`Error: ${input} is not a valid notebook: `)).toBe(true);
            expect(fs.existsSync(output)).toBe(false);
        });
    });

    describe('fix-metadata', () => {
        const TEX = '\\hypersetup{\n  colorlinks=true,\n}\n';

        it('patches once and reports the second run', () => {
            const file = path.join(dir, 'notes.tex');
            fs.writeFileSync(file, TEX);

            const first = capture();
            expect(runCli(['fix-metadata', file, '--title', 'Notes', '--author', 'A. Student'], first.io, DEFAULTS)).toBe(0);
            expect(first.out).toEqual([`Added PDF metadata to ${file}`]);

            const second = capture();
            expect(runCli(['fix-metadata', file, '--title', 'Notes'], second.io, DEFAULTS)).toBe(0);
            expect(second.out).toEqual([`PDF metadata already present in ${file}`]);

            expect(fs.readFileSync(file, 'utf8')).toBe(
                '\\hypersetup{\n      pdftitle={Notes},\n      pdfauthor={A. Student},\n\n  colorlinks=true,\n}\n',
            );
        });

        it('defaults the title to the file name', () => {
            const file = path.join(dir, 'report.tex');
            fs.writeFileSync(file, TEX);

            const { io } = capture();
            expect(runCli(['fix-metadata', file], io, DEFAULTS)).toBe(0);
            expect(fs.readFileSync(file, 'utf8')).toContain('pdftitle={report},\n      pdfauthor={},');
        });

        it('succeeds without the anchor', () => {
            const file = path.join(dir, 'bare.tex');
            fs.writeFileSync(file, 'no anchor');

            const { io, out } = capture();
            expect(runCli(['fix-metadata', file], io, DEFAULTS)).toBe(0);
            expect(out).toEqual([`No \\hypersetup{ in ${file}; metadata not added`]);
        });
    });
});
