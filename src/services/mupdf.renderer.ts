import * as fs from 'fs/promises';
import * as path from 'path';
import * as mupdf from 'mupdf';
import { PDFProcessingError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import type {
    IPdfDocument,
    IPdfRenderer,
    RenderPageOptions,
    RenderedPage,
} from '../types/renderer.types.js';

/**
 * Run a mupdf call with its stderr warnings suppressed
 */
function quietly<T>(fn: () => T): T {
    const origWrite = process.stderr.write;
    process.stderr.write = () => true;
    try {
        return fn();
    } finally {
        process.stderr.write = origWrite;
    }
}

/**
 * Copy pixmap samples out of wasm memory, dropping any row padding
 */
function packSamples(pixels: Uint8ClampedArray, width: number, height: number, channels: number, stride: number): Buffer {
    const rowBytes = width * channels;
    const packed = Buffer.alloc(rowBytes * height);
    if (stride === rowBytes) {
        packed.set(pixels.subarray(0, rowBytes * height));
        return packed;
    }

    for (let y = 0; y < height; y++) {
        const offset = y * stride;
        packed.set(pixels.subarray(offset, offset + rowBytes), y * rowBytes);
    }
    return packed;
}

/**
 * IPdfDocument over a mupdf Document
 */
export class MupdfDocument implements IPdfDocument {
    private closed = false;

    constructor(
        private readonly doc: mupdf.Document,
        private readonly filename: string
    ) {}

    needsPassword(): boolean {
        return this.doc.needsPassword();
    }

    authenticate(password: string): boolean {
        // 0 = rejected; otherwise a bitmask of the permissions granted
        return this.doc.authenticatePassword(password) !== 0;
    }

    countPages(): number {
        return this.doc.countPages();
    }

    renderPage(pageIndex: number, scale: number, options: RenderPageOptions): RenderedPage {
        let page: mupdf.Page | undefined;
        let pixmap: mupdf.Pixmap | undefined;

        try {
            page = this.doc.loadPage(pageIndex);
            const loaded = page;
            const rendered = quietly(() =>
                loaded.toPixmap(mupdf.Matrix.scale(scale, scale), mupdf.ColorSpace.DeviceRGB, options.alpha, true)
            );
            pixmap = rendered;

            const width = rendered.getWidth();
            const height = rendered.getHeight();
            const alpha = Boolean(rendered.getAlpha());
            const channels = alpha ? 4 : 3;

            return {
                width,
                height,
                alpha,
                samples: packSamples(rendered.getPixels(), width, height, channels, rendered.getStride()),
            };
        } catch (error) {
            throw new PDFProcessingError(
                `Failed to render page ${pageIndex + 1}: ${error instanceof Error ? error.message : String(error)}`,
                this.filename,
                { pageNumber: pageIndex + 1, scale }
            );
        } finally {
            pixmap?.destroy();
            page?.destroy();
        }
    }

    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.doc.destroy();
    }
}

/**
 * PDF rendering engine backed by mupdf (WASM)
 */
export class MupdfRenderer implements IPdfRenderer {
    private readonly logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger;
    }

    async open(pdfPath: string): Promise<IPdfDocument> {
        const filename = path.basename(pdfPath);
        const buffer = await fs.readFile(pdfPath);

        let doc: mupdf.Document;
        try {
            doc = quietly(() => mupdf.Document.openDocument(buffer, 'application/pdf'));
        } catch (error) {
            throw new PDFProcessingError(
                `Failed to open PDF: ${error instanceof Error ? error.message : String(error)}`,
                filename,
                { fileSize: buffer.length }
            );
        }

        this.logger.debug('PDF opened', {
            pdfPath,
            fileSize: buffer.length,
        });

        return new MupdfDocument(doc, filename);
    }
}
