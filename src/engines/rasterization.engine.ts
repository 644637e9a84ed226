import { RENDER_DEFAULTS } from '../config/constants.js';
import { PermissionDeniedError } from '../errors/index.js';
import type { IPdfDocument, IPdfRenderer } from '../types/renderer.types.js';
import type { RasterImage } from '../types/raster.types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Rasterization engine: owns the open document and turns pages into pixels
 */
export class RasterizationEngine {
    private readonly renderer: IPdfRenderer;
    private readonly logger: Logger;

    constructor(renderer: IPdfRenderer, logger: Logger) {
        this.renderer = renderer;
        this.logger = logger;
    }

    /**
     * Render scale for a DPI value (72 PDF units per inch)
     */
    static scaleForDpi(dpi: number): number {
        return dpi / RENDER_DEFAULTS.REFERENCE_DPI;
    }

    /**
     * Open and unlock a document, run `fn`, and close the document
     * on every exit path, including a failed unlock.
     */
    async withDocument<T>(
        pdfPath: string,
        password: string | undefined,
        fn: (doc: IPdfDocument) => Promise<T>
    ): Promise<T> {
        const doc = await this.renderer.open(pdfPath);
        try {
            this.authenticate(doc, pdfPath, password);
            return await fn(doc);
        } finally {
            doc.close();
            this.logger.debug('PDF closed', { pdfPath });
        }
    }

    /**
     * @throws PermissionDeniedError when the document is locked and the password is missing or wrong
     */
    authenticate(doc: IPdfDocument, pdfPath: string, password: string | undefined): void {
        if (!doc.needsPassword()) {
            return;
        }
        if (!password) {
            throw new PermissionDeniedError('password_required', pdfPath);
        }
        if (!doc.authenticate(password)) {
            throw new PermissionDeniedError('incorrect_password', pdfPath);
        }
        this.logger.debug('PDF unlocked', { pdfPath });
    }

    /**
     * Render one page with alpha requested, so transparency survives until
     * the output format decides what to do with it.
     */
    rasterize(doc: IPdfDocument, pageIndex: number, dpi: number): RasterImage {
        const scale = RasterizationEngine.scaleForDpi(dpi);
        const rendered = doc.renderPage(pageIndex, scale, { alpha: true });

        this.logger.debug('Page rendered', {
            pageNumber: pageIndex + 1,
            width: rendered.width,
            height: rendered.height,
            alpha: rendered.alpha,
        });

        return {
            data: rendered.samples,
            width: rendered.width,
            height: rendered.height,
            mode: rendered.alpha ? 'rgba' : 'rgb',
        };
    }
}
