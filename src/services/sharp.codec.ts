import sharp from 'sharp';
import { ImageProcessingError, wrapError } from '../errors/index.js';
import type { EncodeSpec, IImageCodec, RgbColor } from '../types/codec.types.js';
import { channelsOf, modeForChannels, type RasterImage } from '../types/raster.types.js';

/**
 * Start a sharp pipeline on raw samples
 */
function fromRaster(image: RasterImage): sharp.Sharp {
    return sharp(image.data, {
        raw: {
            width: image.width,
            height: image.height,
            channels: channelsOf(image.mode),
        },
    });
}

/**
 * Run a pipeline and read the result back as raw samples
 */
async function toRaster(pipeline: sharp.Sharp, operation: string): Promise<RasterImage> {
    const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
    const mode = modeForChannels(info.channels);
    if (!mode) {
        throw new ImageProcessingError(`Unexpected channel count ${info.channels} after ${operation}`, {
            operation,
            channels: info.channels,
        });
    }
    return { data, width: info.width, height: info.height, mode };
}

/**
 * Image codec backed by sharp (libvips)
 */
export class SharpImageCodec implements IImageCodec {
    async flatten(image: RasterImage, background: RgbColor): Promise<RasterImage> {
        return this.run('flatten', () =>
            toRaster(fromRaster(image).flatten({ background }).toColourspace('srgb'), 'flatten')
        );
    }

    async toRgb(image: RasterImage): Promise<RasterImage> {
        return this.run('toRgb', () =>
            toRaster(fromRaster(image).toColourspace('srgb'), 'toRgb')
        );
    }

    async toGrayscale(image: RasterImage): Promise<RasterImage> {
        return this.run('grayscale', () =>
            toRaster(fromRaster(image).removeAlpha().grayscale().toColourspace('b-w'), 'grayscale')
        );
    }

    async resize(image: RasterImage, width: number, height: number): Promise<RasterImage> {
        return this.run('resize', () =>
            toRaster(
                fromRaster(image).resize(width, height, { fit: 'fill', kernel: sharp.kernel.lanczos3 }),
                'resize'
            )
        );
    }

    async encode(image: RasterImage, spec: EncodeSpec): Promise<Buffer> {
        return this.run(`encode:${spec.format}`, () => {
            let pipeline = fromRaster(image);
            // keep single-channel output instead of sharp's default sRGB expansion
            if (image.mode === 'gray') {
                pipeline = pipeline.toColourspace('b-w');
            }

            switch (spec.format) {
                case 'jpg':
                    return pipeline
                        .jpeg({
                            quality: spec.quality,
                            progressive: spec.progressive,
                            optimiseCoding: spec.optimizeCoding,
                        })
                        .toBuffer();
                case 'png':
                    return pipeline
                        .png({
                            compressionLevel: spec.compressionLevel,
                            adaptiveFiltering: spec.adaptiveFiltering,
                        })
                        .toBuffer();
                case 'webp':
                    return pipeline
                        .webp({
                            quality: spec.quality,
                            effort: spec.effort,
                        })
                        .toBuffer();
            }
        });
    }

    /**
     * Normalize libvips failures into ImageProcessingError
     */
    private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            throw wrapError(error, ImageProcessingError, operation);
        }
    }
}
