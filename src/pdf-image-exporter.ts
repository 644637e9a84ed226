import * as fs from 'fs/promises';
import { resolveExportOptions } from './config/export-options.js';
import {
    InterruptedError,
    NotFoundError,
    clearCorrelationId,
    generateCorrelationId,
    setCorrelationId,
} from './errors/index.js';
import type { ExportOptions, ResolvedExportOptions } from './types/config.types.js';
import type {
    ExportResult,
    ExportRunOptions,
    IPdfImageExporter,
} from './types/export.types.js';
import type { IPdfDocument } from './types/renderer.types.js';
import type { RasterizationEngine } from './engines/rasterization.engine.js';
import type { TransformEngine } from './engines/transform.engine.js';
import { buildEncodeSpec, type OutputEngine } from './engines/output.engine.js';
import { ExportEventEmitter } from './utils/events.js';
import type { Logger } from './utils/logger.js';
import { describePageRange, resolvePageRange, type PageRange } from './utils/page-range.js';

function throwIfAborted(signal: AbortSignal | undefined, pagesCompleted: number): void {
    if (signal?.aborted) {
        throw new InterruptedError(pagesCompleted);
    }
}

/**
 * Dependencies injected into PdfImageExporter
 */
export interface PdfImageExporterDependencies {
    rasterizer: RasterizationEngine;
    transformer: TransformEngine;
    output: OutputEngine;
    logger: Logger;
    events?: ExportEventEmitter;
}

/**
 * Converts the pages of a PDF into image files
 *
 * @example
 * ```typescript
 * import { createPdfImageExporter } from 'pdf-page-images';
 *
 * const exporter = createPdfImageExporter();
 * const result = await exporter.export({
 *   pdfPath: 'report.pdf',
 *   format: 'png',
 *   dpi: 150,
 * });
 * console.log(result.written);
 * ```
 */
export class PdfImageExporter implements IPdfImageExporter {
    public readonly events: ExportEventEmitter;

    private readonly rasterizer: RasterizationEngine;
    private readonly transformer: TransformEngine;
    private readonly output: OutputEngine;
    private readonly logger: Logger;

    constructor(dependencies: PdfImageExporterDependencies) {
        this.rasterizer = dependencies.rasterizer;
        this.transformer = dependencies.transformer;
        this.output = dependencies.output;
        this.logger = dependencies.logger;
        this.events = dependencies.events ?? new ExportEventEmitter();
    }

    /**
     * Export every page in the requested range
     *
     * Validation and the input check run before anything is written.
     * A failure part-way through leaves earlier pages on disk.
     */
    async export(options: ExportOptions, runOptions: ExportRunOptions = {}): Promise<ExportResult> {
        const startTime = Date.now();
        setCorrelationId(generateCorrelationId());

        try {
            const resolved = resolveExportOptions(options);
            await this.assertInputFile(resolved.pdfPath);

            if (!resolved.filenameTemplate.hasField('page')) {
                this.logger.warn('Filename template has no {page} placeholder; pages will share one file name', {
                    template: resolved.filenameTemplate.source,
                });
            }

            await this.output.prepareDirectory(resolved.outputDir);

            const result = await this.rasterizer.withDocument(
                resolved.pdfPath,
                resolved.password,
                (doc) => this.exportPages(doc, resolved, runOptions.signal, startTime)
            );

            this.events.emit('export:complete', result);
            return result;
        } catch (error) {
            const err = error instanceof Error ? error : new Error(String(error));
            this.logger.error('Export failed', {
                pdfPath: options.pdfPath,
                error: err.message,
            });
            this.events.emit('export:error', { pdfPath: options.pdfPath, error: err });
            throw error;
        } finally {
            clearCorrelationId();
        }
    }

    private async assertInputFile(pdfPath: string): Promise<void> {
        const isFile = await fs.stat(pdfPath).then(
            (stats) => stats.isFile(),
            () => false
        );
        if (!isFile) {
            throw new NotFoundError('PDF', pdfPath);
        }
    }

    private async exportPages(
        doc: IPdfDocument,
        options: ResolvedExportOptions,
        signal: AbortSignal | undefined,
        startTime: number
    ): Promise<ExportResult> {
        const pageCount = doc.countPages();
        const range = resolvePageRange(options.startPage, options.endPage, pageCount);

        this.logger.info('Export started', {
            pdfPath: options.pdfPath,
            pageCount,
            pages: describePageRange(range),
            format: options.format,
            dpi: options.dpi,
            outputDir: options.outputDir,
        });
        this.events.emit('export:start', {
            pdfPath: options.pdfPath,
            pageCount,
            range,
            outputDir: options.outputDir,
        });

        const written: string[] = [];
        const skipped: string[] = [];

        for (let pageIndex = range.first; pageIndex <= range.last; pageIndex++) {
            throwIfAborted(signal, written.length + skipped.length);

            const outcome = await this.exportPage(doc, pageIndex, options);
            (outcome.skipped ? skipped : written).push(outcome.path);
        }
        // an abort during the last page still counts
        throwIfAborted(signal, written.length + skipped.length);

        const result = this.buildResult(options, pageCount, range, written, skipped, startTime);
        this.logger.info('Export completed', {
            pdfPath: options.pdfPath,
            written: written.length,
            skipped: skipped.length,
            durationMs: result.durationMs,
        });
        return result;
    }

    /**
     * Render, transform and write one page, unless its file is kept
     */
    private async exportPage(
        doc: IPdfDocument,
        pageIndex: number,
        options: ResolvedExportOptions
    ): Promise<{ path: string; skipped: boolean }> {
        const pageNumber = pageIndex + 1;
        const target = await this.output.resolveTarget(options, pageNumber);

        if (this.output.shouldSkip(target, options.overwrite)) {
            this.logger.debug('Page skipped, file exists', { pageNumber, filePath: target.filePath });
            this.events.emit('page:skipped', { pageNumber, filePath: target.filePath });
            return { path: target.filePath, skipped: true };
        }

        const raster = this.rasterizer.rasterize(doc, pageIndex, options.dpi);
        const image = await this.transformer.apply(raster, {
            format: options.format,
            grayscale: options.grayscale,
            maxDimension: options.maxDimension,
        });
        const bytes = await this.output.write(image, target, buildEncodeSpec(options.format, options.quality));

        this.events.emit('page:written', {
            pageNumber,
            filePath: target.filePath,
            width: image.width,
            height: image.height,
            bytes,
        });
        return { path: target.filePath, skipped: false };
    }

    private buildResult(
        options: ResolvedExportOptions,
        pageCount: number,
        range: PageRange,
        written: string[],
        skipped: string[],
        startTime: number
    ): ExportResult {
        return {
            outputDir: options.outputDir,
            pageCount,
            range,
            written,
            skipped,
            durationMs: Date.now() - startTime,
        };
    }
}
