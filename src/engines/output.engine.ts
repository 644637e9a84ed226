import * as fs from 'fs/promises';
import * as path from 'path';
import { ENCODING_DEFAULTS } from '../config/constants.js';
import { FORMAT_TRAITS, type ResolvedExportOptions } from '../types/config.types.js';
import type { EncodeSpec, IImageCodec } from '../types/codec.types.js';
import type { OutputFormat } from '../types/enums.js';
import type { OutputTarget } from '../types/export.types.js';
import type { RasterImage } from '../types/raster.types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Encoder parameters for a format
 */
export function buildEncodeSpec(format: OutputFormat, quality: number): EncodeSpec {
    switch (format) {
        case 'jpg':
            return { format, quality, progressive: true, optimizeCoding: true };
        case 'png':
            return {
                format,
                compressionLevel: ENCODING_DEFAULTS.PNG_COMPRESSION_LEVEL,
                adaptiveFiltering: true,
            };
        case 'webp':
            return { format, quality, effort: ENCODING_DEFAULTS.WEBP_EFFORT };
    }
}

async function pathExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Output engine: names, encodes and writes page images
 */
export class OutputEngine {
    private readonly codec: IImageCodec;
    private readonly logger: Logger;

    constructor(codec: IImageCodec, logger: Logger) {
        this.codec = codec;
        this.logger = logger;
    }

    /**
     * Create the output directory (and parents); no-op when it exists
     */
    async prepareDirectory(outputDir: string): Promise<void> {
        await fs.mkdir(outputDir, { recursive: true });
    }

    fileNameFor(options: ResolvedExportOptions, pageNumber: number): string {
        const base = options.filenameTemplate.render({ stem: options.stem, page: pageNumber });
        return `${base}.${FORMAT_TRAITS[options.format].extension}`;
    }

    async resolveTarget(options: ResolvedExportOptions, pageNumber: number): Promise<OutputTarget> {
        const fileName = this.fileNameFor(options, pageNumber);
        const filePath = path.join(options.outputDir, fileName);
        return { fileName, filePath, exists: await pathExists(filePath) };
    }

    /**
     * Overwrite policy: an existing file is kept when overwrite is off
     */
    shouldSkip(target: OutputTarget, overwrite: boolean): boolean {
        return target.exists && !overwrite;
    }

    /**
     * Encode and write one image
     * @returns Bytes written
     */
    async write(image: RasterImage, target: OutputTarget, spec: EncodeSpec): Promise<number> {
        const encoded = await this.codec.encode(image, spec);
        await fs.writeFile(target.filePath, encoded);

        this.logger.debug('Page written', {
            filePath: target.filePath,
            format: spec.format,
            bytes: encoded.length,
        });

        return encoded.length;
    }
}
