/**
 * pdf-page-images: render PDF pages to JPG, PNG or WEBP files
 *
 * @packageDocumentation
 */

// Main class and factory
export { PdfImageExporter, type PdfImageExporterDependencies } from './pdf-image-exporter.js';
export {
    PdfImageExporterFactory,
    createPdfImageExporter,
    pdfToImages,
} from './pdf-image-exporter.factory.js';

// Engines
export {
    RasterizationEngine,
    TransformEngine,
    OutputEngine,
    TRANSFORM_STEPS,
    buildEncodeSpec,
    computeDownscaleSize,
    type TransformContext,
    type TransformStep,
} from './engines/index.js';

// Default renderer and codec
export { MupdfRenderer, MupdfDocument, SharpImageCodec } from './services/index.js';

// Types
export * from './types/index.js';

// Configuration
export { resolveExportOptions, defaultOutputDir } from './config/export-options.js';
export { parseEnv, type Env } from './config/env.js';
export {
    RENDER_DEFAULTS,
    ENCODING_DEFAULTS,
    OUTPUT_DEFAULTS,
    EXIT_CODES,
    type ExitCode,
} from './config/constants.js';

// Errors
export {
    PdfImageExportError,
    ConfigurationError,
    ValidationError,
    NotFoundError,
    PermissionDeniedError,
    PDFProcessingError,
    ImageProcessingError,
    InterruptedError,
    wrapError,
    generateCorrelationId,
    getCorrelationId,
    type ErrorContext,
    type PermissionDeniedReason,
} from './errors/index.js';

// Utilities
export {
    createLogger,
    ExportEventEmitter,
    createEventEmitter,
    FilenameTemplate,
    resolvePageRange,
    pageRangeSize,
    describePageRange,
} from './utils/index.js';
export type {
    Logger,
    LogMeta,
    ExportEvents,
    PageRange,
    TemplateField,
    TemplateValues,
} from './utils/index.js';
