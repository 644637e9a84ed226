import { PdfImageExporter, type PdfImageExporterDependencies } from './pdf-image-exporter.js';
import { DEFAULT_LOG_CONFIG, type ExporterConfig, type LogConfig } from './types/config.types.js';
import type { ExportOptions } from './types/config.types.js';
import type { IImageCodec } from './types/codec.types.js';
import type { IPdfRenderer } from './types/renderer.types.js';
import { RasterizationEngine } from './engines/rasterization.engine.js';
import { TransformEngine } from './engines/transform.engine.js';
import { OutputEngine } from './engines/output.engine.js';
import { MupdfRenderer } from './services/mupdf.renderer.js';
import { SharpImageCodec } from './services/sharp.codec.js';
import { createEventEmitter } from './utils/events.js';
import { createLogger } from './utils/logger.js';

/**
 * Factory for creating PdfImageExporter instances with their dependencies wired
 *
 * The renderer and codec default to mupdf and sharp; either can be
 * replaced through the config.
 *
 * @example
 * ```typescript
 * import { PdfImageExporterFactory } from 'pdf-page-images';
 *
 * const exporter = PdfImageExporterFactory.create({
 *   logging: { level: 'debug', structured: false },
 * });
 * await exporter.export({ pdfPath: 'slides.pdf', format: 'webp' });
 * ```
 */
export class PdfImageExporterFactory {
    static create(config: ExporterConfig = {}): PdfImageExporter {
        const logging = PdfImageExporterFactory.resolveLogging(config);
        const logger = createLogger(logging);

        const renderer: IPdfRenderer = config.renderer ?? new MupdfRenderer(logger);
        const codec: IImageCodec = config.codec ?? new SharpImageCodec();

        const dependencies: PdfImageExporterDependencies = {
            rasterizer: new RasterizationEngine(renderer, logger),
            transformer: new TransformEngine(codec, logger),
            output: new OutputEngine(codec, logger),
            logger,
            events: createEventEmitter(),
        };

        return new PdfImageExporter(dependencies);
    }

    private static resolveLogging(config: ExporterConfig): LogConfig {
        return {
            ...DEFAULT_LOG_CONFIG,
            ...config.logging,
            level: config.logging?.level ?? DEFAULT_LOG_CONFIG.level,
        };
    }
}

/**
 * Create a new PdfImageExporter
 *
 * @example
 * ```typescript
 * const exporter = createPdfImageExporter();
 * const { written } = await exporter.export({ pdfPath: 'report.pdf', startPage: 2, endPage: 4 });
 * ```
 */
export function createPdfImageExporter(config: ExporterConfig = {}): PdfImageExporter {
    return PdfImageExporterFactory.create(config);
}

/**
 * One-call conversion
 *
 * @returns The output directory the images were written to
 *
 * @example
 * ```typescript
 * const outDir = await pdfToImages({ pdfPath: 'report.pdf', dpi: 150 });
 * ```
 */
export async function pdfToImages(options: ExportOptions, config: ExporterConfig = {}): Promise<string> {
    const result = await createPdfImageExporter(config).export(options);
    return result.outputDir;
}
