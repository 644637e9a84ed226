import { EventEmitter } from 'events';
import type { ExportResult } from '../types/export.types.js';
import type { PageRange } from './page-range.js';

/**
 * Event types emitted during an export
 */
export interface ExportEvents {
    'export:start': { pdfPath: string; pageCount: number; range: PageRange; outputDir: string };
    'page:written': { pageNumber: number; filePath: string; width: number; height: number; bytes: number };
    'page:skipped': { pageNumber: number; filePath: string };
    'export:complete': ExportResult;
    'export:error': { pdfPath: string; error: Error };
}

/**
 * Type-safe event emitter for export progress
 */
export class ExportEventEmitter extends EventEmitter {
    emit<K extends keyof ExportEvents>(
        event: K,
        data: ExportEvents[K]
    ): boolean {
        return super.emit(event, data);
    }

    on<K extends keyof ExportEvents>(
        event: K,
        listener: (data: ExportEvents[K]) => void
    ): this {
        return super.on(event, listener);
    }

    once<K extends keyof ExportEvents>(
        event: K,
        listener: (data: ExportEvents[K]) => void
    ): this {
        return super.once(event, listener);
    }

    off<K extends keyof ExportEvents>(
        event: K,
        listener: (data: ExportEvents[K]) => void
    ): this {
        return super.off(event, listener);
    }
}

/**
 * Create a new event emitter instance
 */
export function createEventEmitter(): ExportEventEmitter {
    return new ExportEventEmitter();
}
