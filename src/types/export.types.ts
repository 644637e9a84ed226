import type { PageRange } from '../utils/page-range.js';
import type { ExportEventEmitter } from '../utils/events.js';
import type { ExportOptions } from './config.types.js';

/**
 * Where one page's image goes
 */
export interface OutputTarget {
    /** File name including extension */
    fileName: string;
    /** Absolute file path */
    filePath: string;
    /** A file already exists at `filePath` */
    exists: boolean;
}

/**
 * Per-run controls that are not part of the conversion itself
 */
export interface ExportRunOptions {
    /** Checked before each page; aborting raises InterruptedError */
    signal?: AbortSignal;
}

/**
 * Outcome of a completed export
 */
export interface ExportResult {
    /** Absolute output directory */
    outputDir: string;
    /** Pages in the document */
    pageCount: number;
    /** Zero-based inclusive range that was processed */
    range: PageRange;
    /** Files written, in page order */
    written: string[];
    /** Existing files left untouched because overwrite was off */
    skipped: string[];
    durationMs: number;
}

/**
 * Public surface of the exporter, as consumed by the CLI
 */
export interface IPdfImageExporter {
    readonly events: ExportEventEmitter;
    export(options: ExportOptions, runOptions?: ExportRunOptions): Promise<ExportResult>;
}
