import { z } from 'zod';
import type { DestinationStream } from 'pino';
import { ENCODING_DEFAULTS, OUTPUT_DEFAULTS, RENDER_DEFAULTS } from '../config/constants.js';
import { FORMAT_ALIASES, type OutputFormat } from './enums.js';
import type { FilenameTemplate } from '../utils/filename-template.js';
import type { IPdfRenderer } from './renderer.types.js';
import type { IImageCodec } from './codec.types.js';

/**
 * Options for one PDF-to-images export
 */
export interface ExportOptions {
    /** Path to the input PDF */
    pdfPath: string;
    /** Output directory (default: the PDF path without its extension) */
    outputDir?: string;
    /** Render resolution in pixels per inch (default: 300) */
    dpi?: number;
    /** JPG/WEBP quality 1-100 (default: 92); PNG ignores it */
    quality?: number;
    /** First page, 1-based inclusive (default: first page) */
    startPage?: number;
    /** Last page, 1-based inclusive (default: last page) */
    endPage?: number;
    /** 'jpg', 'jpeg', 'png' or 'webp', case-insensitive (default: 'jpg') */
    format?: string;
    /** Replace existing files; when false they are skipped (default: true) */
    overwrite?: boolean;
    /** Output name without extension, see FilenameTemplate (default: '{stem}_p{page:03d}') */
    filenameTemplate?: string;
    /** Password for encrypted PDFs */
    password?: string;
    /** Convert output to grayscale (default: false) */
    grayscale?: boolean;
    /** Shrink so the larger side is at most this many pixels */
    maxDimension?: number;
}

/**
 * Export options after validation, with defaults applied
 */
export interface ResolvedExportOptions {
    /** Absolute path to the input PDF */
    pdfPath: string;
    /** PDF file name without extension */
    stem: string;
    /** Absolute output directory */
    outputDir: string;
    dpi: number;
    quality: number;
    format: OutputFormat;
    startPage?: number;
    endPage?: number;
    overwrite: boolean;
    filenameTemplate: FilenameTemplate;
    password?: string;
    grayscale: boolean;
    maxDimension?: number;
}

/**
 * Logging configuration
 */
export interface LogConfig {
    /** Log level */
    level: 'debug' | 'info' | 'warn' | 'error';
    /** Enable structured JSON logging (default: true) */
    structured: boolean;
    /** Custom logger function */
    customLogger?: (level: string, message: string, meta?: Record<string, unknown>) => void;
    /** Synchronous sink for log lines (default: stderr) */
    destination?: DestinationStream;
}

/**
 * Exporter construction options
 */
export interface ExporterConfig {
    /** Logging configuration */
    logging?: Partial<LogConfig>;
    /** Rendering engine (default: mupdf) */
    renderer?: IPdfRenderer;
    /** Image codec (default: sharp) */
    codec?: IImageCodec;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
    level: 'info',
    structured: true,
};

/**
 * Static traits of each output format
 */
export interface FormatTraits {
    extension: string;
    /** Can store an alpha channel */
    supportsAlpha: boolean;
    /** Uses the quality setting */
    lossy: boolean;
}

export const FORMAT_TRAITS: Readonly<Record<OutputFormat, FormatTraits>> = {
    jpg: { extension: 'jpg', supportsAlpha: false, lossy: true },
    png: { extension: 'png', supportsAlpha: true, lossy: false },
    webp: { extension: 'webp', supportsAlpha: false, lossy: true },
};

/**
 * Map any accepted spelling to its canonical format
 */
export function normalizeFormat(value: string): OutputFormat | undefined {
    const key = value.trim().toLowerCase();
    return Object.hasOwn(FORMAT_ALIASES, key) ? FORMAT_ALIASES[key] : undefined;
}

const SUPPORTED_FORMATS = Object.keys(FORMAT_ALIASES).sort().join(', ');

const formatSchema = z.string().transform((value, ctx): OutputFormat => {
    const format = normalizeFormat(value);
    if (!format) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unsupported format '${value}'. Choose from: ${SUPPORTED_FORMATS}.`,
            fatal: true,
        });
        return z.NEVER;
    }
    return format;
});

/**
 * Zod schema for export option validation
 */
export const exportOptionsSchema = z
    .object({
        pdfPath: z.string().min(1, 'pdfPath is required.'),
        outputDir: z.string().min(1, 'outputDir must not be empty.').optional(),
        dpi: z
            .number()
            .int('dpi must be an integer.')
            .positive('dpi must be > 0.')
            .default(RENDER_DEFAULTS.DPI),
        quality: z.number().int('quality must be an integer.').default(ENCODING_DEFAULTS.QUALITY),
        startPage: z.number().int('startPage must be an integer.').optional(),
        endPage: z.number().int('endPage must be an integer.').optional(),
        format: formatSchema.default(OUTPUT_DEFAULTS.FORMAT),
        overwrite: z.boolean().default(OUTPUT_DEFAULTS.OVERWRITE),
        filenameTemplate: z
            .string()
            .min(1, 'filenameTemplate must not be empty.')
            .default(OUTPUT_DEFAULTS.FILENAME_TEMPLATE),
        password: z.string().optional(),
        grayscale: z.boolean().default(false),
        maxDimension: z
            .number()
            .int('maxDimension must be an integer.')
            .positive('maxDimension must be > 0.')
            .optional(),
    })
    .superRefine((options, ctx) => {
        if (!FORMAT_TRAITS[options.format].lossy) {
            return;
        }
        if (options.quality < ENCODING_DEFAULTS.MIN_QUALITY || options.quality > ENCODING_DEFAULTS.MAX_QUALITY) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['quality'],
                message: `quality must be in [${ENCODING_DEFAULTS.MIN_QUALITY}, ${ENCODING_DEFAULTS.MAX_QUALITY}].`,
            });
        }
    });

export type ValidatedExportOptions = z.infer<typeof exportOptionsSchema>;
