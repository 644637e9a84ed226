import { describe, it, expect } from 'vitest';
import * as path from 'path';
import {
    exportOptionsSchema,
    normalizeFormat,
    FORMAT_TRAITS,
    DEFAULT_LOG_CONFIG,
} from '../src/types/config.types.js';
import { resolveExportOptions, defaultOutputDir } from '../src/config/export-options.js';
import { parseEnv } from '../src/config/env.js';
import { ConfigurationError, ValidationError } from '../src/errors/index.js';
import { createMockExportOptions } from './mocks/fixtures.js';

describe('Configuration Types', () => {
    describe('exportOptionsSchema', () => {
        it('should apply defaults to minimal options', () => {
            const result = exportOptionsSchema.safeParse({ pdfPath: 'report.pdf' });

            expect(result.success).toBe(true);
            expect(result.data).toEqual({
                pdfPath: 'report.pdf',
                dpi: 300,
                quality: 92,
                format: 'jpg',
                overwrite: true,
                filenameTemplate: '{stem}_p{page:03d}',
                grayscale: false,
            });
        });

        it('should reject empty pdfPath', () => {
            const result = exportOptionsSchema.safeParse({ pdfPath: '' });

            expect(result.success).toBe(false);
        });

        it('should treat jpeg as jpg', () => {
            const result = exportOptionsSchema.safeParse({ pdfPath: 'a.pdf', format: 'jpeg' });

            expect(result.data?.format).toBe('jpg');
        });

        it('should accept formats case-insensitively', () => {
            const result = exportOptionsSchema.safeParse({ pdfPath: 'a.pdf', format: 'WEBP' });

            expect(result.data?.format).toBe('webp');
        });

        it('should reject unknown formats with the accepted list', () => {
            const result = exportOptionsSchema.safeParse({ pdfPath: 'a.pdf', format: 'tiff' });

            expect(result.success).toBe(false);
            expect(result.error?.issues[0]?.message).toBe(
                "Unsupported format 'tiff'. Choose from: jpeg, jpg, png, webp."
            );
        });

        it.each([0, -72])('should reject dpi %i', (dpi) => {
            const result = exportOptionsSchema.safeParse({ pdfPath: 'a.pdf', dpi });

            expect(result.success).toBe(false);
            expect(result.error?.issues[0]?.message).toBe('dpi must be > 0.');
        });

        it.each([
            ['jpg', 0],
            ['jpg', 101],
            ['webp', 0],
            ['webp', 101],
        ])('should reject %s quality %i', (format, quality) => {
            const result = exportOptionsSchema.safeParse({ pdfPath: 'a.pdf', format, quality });

            expect(result.success).toBe(false);
            expect(result.error?.issues[0]?.path).toEqual(['quality']);
            expect(result.error?.issues[0]?.message).toBe('quality must be in [1, 100].');
        });

        it.each([0, 101, 150])('should ignore png quality %i', (quality) => {
            const result = exportOptionsSchema.safeParse({ pdfPath: 'a.pdf', format: 'png', quality });

            expect(result.success).toBe(true);
        });

        it.each([1, 100])('should accept boundary quality %i', (quality) => {
            const result = exportOptionsSchema.safeParse({ pdfPath: 'a.pdf', quality });

            expect(result.success).toBe(true);
        });

        it('should reject a non-positive maxDimension', () => {
            const result = exportOptionsSchema.safeParse({ pdfPath: 'a.pdf', maxDimension: 0 });

            expect(result.error?.issues[0]?.message).toBe('maxDimension must be > 0.');
        });
    });

    describe('normalizeFormat', () => {
        it('should map aliases and trim input', () => {
            expect(normalizeFormat(' JPEG ')).toBe('jpg');
            expect(normalizeFormat('png')).toBe('png');
        });

        it('should return undefined for unknown formats', () => {
            expect(normalizeFormat('gif')).toBeUndefined();
            expect(normalizeFormat('toString')).toBeUndefined();
        });
    });

    describe('FORMAT_TRAITS', () => {
        it('should only let png keep alpha', () => {
            expect(FORMAT_TRAITS.png.supportsAlpha).toBe(true);
            expect(FORMAT_TRAITS.jpg.supportsAlpha).toBe(false);
            expect(FORMAT_TRAITS.webp.supportsAlpha).toBe(false);
        });
    });

    describe('DEFAULT_LOG_CONFIG', () => {
        it('should default to structured info logging', () => {
            expect(DEFAULT_LOG_CONFIG).toEqual({ level: 'info', structured: true });
        });
    });
});

describe('resolveExportOptions', () => {
    it('should derive stem and default output directory', () => {
        const resolved = resolveExportOptions(createMockExportOptions());

        expect(resolved.pdfPath).toBe(path.resolve('/tmp/docs/report.pdf'));
        expect(resolved.stem).toBe('report');
        expect(resolved.outputDir).toBe(path.resolve('/tmp/docs/report'));
        expect(resolved.filenameTemplate.source).toBe('{stem}_p{page:03d}');
    });

    it('should resolve a relative output directory', () => {
        const resolved = resolveExportOptions(createMockExportOptions({ outputDir: 'images' }));

        expect(resolved.outputDir).toBe(path.resolve('images'));
    });

    it('should keep inner dots in the stem', () => {
        const resolved = resolveExportOptions({ pdfPath: '/tmp/report.final.pdf' });

        expect(resolved.stem).toBe('report.final');
    });

    it('should raise ValidationError naming the field', () => {
        expect(() => resolveExportOptions(createMockExportOptions({ format: 'jpg', quality: 150 }))).toThrow(
            ValidationError
        );

        try {
            resolveExportOptions(createMockExportOptions({ dpi: 0 }));
            expect.fail('should have thrown');
        } catch (error) {
            expect(error).toBeInstanceOf(ValidationError);
            if (error instanceof ValidationError) {
                expect(error.message).toBe('dpi must be > 0.');
                expect(error.field).toBe('dpi');
            }
        }
    });

    it('should reject a bad filename template', () => {
        expect(() => resolveExportOptions(createMockExportOptions({ filenameTemplate: '{name}' }))).toThrow(
            "Invalid filename template '{name}': unknown placeholder '{name}', expected {stem} or {page}."
        );
    });

    it('should keep page bounds for later range resolution', () => {
        const resolved = resolveExportOptions(createMockExportOptions({ startPage: 2, endPage: 4 }));

        expect(resolved.startPage).toBe(2);
        expect(resolved.endPage).toBe(4);
    });
});

describe('defaultOutputDir', () => {
    it('should strip the extension', () => {
        expect(defaultOutputDir('/data/scan.PDF')).toBe(path.join('/data', 'scan'));
    });
});

describe('parseEnv', () => {
    it('should default LOG_LEVEL to info', () => {
        expect(parseEnv({})).toEqual({ LOG_LEVEL: 'info' });
    });

    it('should accept a known level', () => {
        expect(parseEnv({ LOG_LEVEL: 'debug' }).LOG_LEVEL).toBe('debug');
    });

    it('should raise ConfigurationError for an unknown level', () => {
        expect(() => parseEnv({ LOG_LEVEL: 'trace' })).toThrow(ConfigurationError);
        expect(() => parseEnv({ LOG_LEVEL: 'trace' })).toThrow(/^Environment validation failed:/);
    });
});
