/**
 * Pixels produced by the rendering engine for one page
 */
export interface RenderedPage {
    width: number;
    height: number;
    /** True when samples carry a trailing alpha channel (RGBA), false for RGB */
    alpha: boolean;
    /** Packed samples, 3 or 4 bytes per pixel */
    samples: Buffer;
}

export interface RenderPageOptions {
    /** Ask the engine for an alpha channel */
    alpha: boolean;
}

/**
 * An open PDF document
 *
 * Owned by a single export run; `close()` must be called exactly once.
 */
export interface IPdfDocument {
    /** Whether the document must be unlocked before its pages can be read */
    needsPassword(): boolean;

    /**
     * Try to unlock the document
     * @returns true when the password was accepted
     */
    authenticate(password: string): boolean;

    countPages(): number;

    /**
     * Rasterize one page
     * @param pageIndex - Zero-based page index
     * @param scale - Pixels per PDF unit (dpi / 72)
     */
    renderPage(pageIndex: number, scale: number, options: RenderPageOptions): RenderedPage;

    close(): void;
}

/**
 * PDF Renderer Interface
 *
 * Abstraction over the rasterizing library (mupdf).
 * Allows swapping engines, or faking one in tests, without changing the pipeline.
 *
 * @example
 * ```typescript
 * const doc = await renderer.open('report.pdf');
 * try {
 *   const page = doc.renderPage(0, 300 / 72, { alpha: true });
 * } finally {
 *   doc.close();
 * }
 * ```
 */
export interface IPdfRenderer {
    /**
     * Open a PDF from disk
     * @throws PDFProcessingError when the file is not a readable PDF
     */
    open(pdfPath: string): Promise<IPdfDocument>;
}
