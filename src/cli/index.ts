import { readFileSync } from 'fs';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { EXIT_CODES, ENCODING_DEFAULTS, OUTPUT_DEFAULTS, RENDER_DEFAULTS, type ExitCode } from '../config/constants.js';
import { InterruptedError } from '../errors/index.js';
import { createPdfImageExporter } from '../pdf-image-exporter.factory.js';
import { normalizeFormat, type ExporterConfig, type ExportOptions, type LogConfig } from '../types/config.types.js';
import type { OutputFormat } from '../types/enums.js';
import type { IPdfImageExporter } from '../types/export.types.js';
import { PageProgress, type ProgressStream } from './progress.js';

/**
 * Parsed command-line options
 */
export interface CliOptions {
    outDir?: string;
    dpi: number;
    quality: number;
    start?: number;
    end?: number;
    format: OutputFormat;
    overwrite: boolean;
    template: string;
    password?: string;
    grayscale?: boolean;
    maxDim?: number;
    verbose?: boolean;
}

export interface CliContext {
    /** Builds the exporter for a run (default: mupdf + sharp) */
    createExporter?: (config: ExporterConfig) => IPdfImageExporter;
    stdout?: ProgressStream;
    stderr?: ProgressStream;
    /** Log level when --verbose is not given */
    logLevel?: LogConfig['level'];
}

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
    const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
    const parsed = packageSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.version : '0.0.0';
}

function parseInteger(name: string): (value: string) => number {
    return (value: string): number => {
        if (!/^-?\d+$/.test(value.trim())) {
            throw new InvalidArgumentError(`${name} must be an integer.`);
        }
        return Number(value);
    };
}

function parseFormat(value: string): OutputFormat {
    const format = normalizeFormat(value);
    if (!format) {
        throw new InvalidArgumentError('Choose from: jpeg, jpg, png, webp.');
    }
    return format;
}

/**
 * Build the commander program
 *
 * Parsing never exits the process; commander errors surface as CommanderError.
 */
export function buildProgram(stdout: ProgressStream, stderr: ProgressStream): Command {
    return new Command()
        .name('pdf-page-images')
        .description('Export the pages of a PDF as JPG, PNG or WEBP images')
        .version(readVersion())
        .argument('<pdf>', 'input PDF file')
        .option('-o, --out-dir <dir>', 'output directory (default: a folder named after the PDF)')
        .option('--dpi <n>', 'render resolution', parseInteger('dpi'), RENDER_DEFAULTS.DPI)
        .option('--quality <n>', 'JPG/WEBP quality 1-100', parseInteger('quality'), ENCODING_DEFAULTS.QUALITY)
        .option('--start <n>', 'first page, 1-based', parseInteger('start'))
        .option('--end <n>', 'last page, 1-based inclusive', parseInteger('end'))
        .option('--format <fmt>', 'jpg, jpeg, png or webp', parseFormat, OUTPUT_DEFAULTS.FORMAT)
        .option('--no-overwrite', 'skip pages whose image file already exists')
        .option('--template <pattern>', 'filename template without extension', OUTPUT_DEFAULTS.FILENAME_TEMPLATE)
        .option('--password <pw>', 'password for encrypted PDFs')
        .option('--grayscale', 'write grayscale images')
        .option('--max-dim <px>', 'shrink so the larger side is at most this many pixels', parseInteger('max-dim'))
        .option('-v, --verbose', 'debug logging')
        .exitOverride()
        .configureOutput({
            writeOut: (str) => {
                stdout.write(str);
            },
            writeErr: (str) => {
                stderr.write(str);
            },
        });
}

export function toExportOptions(pdfPath: string, options: CliOptions): ExportOptions {
    return {
        pdfPath,
        outputDir: options.outDir,
        dpi: options.dpi,
        quality: options.quality,
        startPage: options.start,
        endPage: options.end,
        format: options.format,
        overwrite: options.overwrite,
        filenameTemplate: options.template,
        password: options.password,
        grayscale: options.grayscale ?? false,
        maxDimension: options.maxDim,
    };
}

/**
 * Run the CLI
 *
 * @param argv - Full argv, node binary and script path included
 * @returns Process exit code
 */
export async function main(argv: readonly string[], context: CliContext = {}): Promise<ExitCode> {
    const stdout = context.stdout ?? process.stdout;
    const stderr = context.stderr ?? process.stderr;
    const program = buildProgram(stdout, stderr);

    try {
        await program.parseAsync([...argv]);
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
        }
        throw error;
    }

    const [pdfPath] = program.args;
    const options = program.opts<CliOptions>();

    const progress = new PageProgress(stderr);
    const createExporter = context.createExporter ?? createPdfImageExporter;
    const exporter = createExporter({
        logging: {
            level: options.verbose ? 'debug' : context.logLevel ?? 'info',
            structured: !stderr.isTTY,
            ...(progress.enabled && { destination: progress.createLogStream() }),
        },
    });

    const controller = new AbortController();
    const onSigint = (): void => controller.abort();
    process.once('SIGINT', onSigint);

    const detach = progress.attach(exporter.events);

    try {
        const result = await exporter.export(toExportOptions(pdfPath, options), {
            signal: controller.signal,
        });
        if (controller.signal.aborted) {
            throw new InterruptedError(result.written.length + result.skipped.length);
        }
        stdout.write(`Saved images to: ${result.outputDir}\n`);
        return EXIT_CODES.SUCCESS;
    } catch (error) {
        if (error instanceof InterruptedError) {
            stderr.write('Interrupted.\n');
            return EXIT_CODES.INTERRUPTED;
        }
        stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
        return EXIT_CODES.FAILURE;
    } finally {
        detach();
        process.removeListener('SIGINT', onSigint);
    }
}
