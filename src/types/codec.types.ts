import type { RasterImage } from './raster.types.js';

/**
 * Opaque background color for alpha flattening
 */
export interface RgbColor {
    r: number;
    g: number;
    b: number;
}

export interface JpgEncodeSpec {
    format: 'jpg';
    quality: number;
    progressive: boolean;
    /** Optimized Huffman tables */
    optimizeCoding: boolean;
}

export interface PngEncodeSpec {
    format: 'png';
    compressionLevel: number;
    adaptiveFiltering: boolean;
}

export interface WebpEncodeSpec {
    format: 'webp';
    quality: number;
    effort: number;
}

/**
 * Per-format encoder parameters, discriminated by `format`
 */
export type EncodeSpec = JpgEncodeSpec | PngEncodeSpec | WebpEncodeSpec;

/**
 * Image Codec Interface
 *
 * Abstraction over the image library (sharp). Every operation is pure:
 * it returns a new raster and leaves its input untouched.
 */
export interface IImageCodec {
    /**
     * Composite over an opaque background and drop alpha
     * @returns An `rgb` raster
     */
    flatten(image: RasterImage, background: RgbColor): Promise<RasterImage>;

    /**
     * Convert an alpha-free raster to three-channel RGB
     */
    toRgb(image: RasterImage): Promise<RasterImage>;

    /**
     * Convert to single-channel luminance, dropping alpha
     * @returns A `gray` raster
     */
    toGrayscale(image: RasterImage): Promise<RasterImage>;

    /**
     * Resample to exact dimensions with a Lanczos filter
     */
    resize(image: RasterImage, width: number, height: number): Promise<RasterImage>;

    encode(image: RasterImage, spec: EncodeSpec): Promise<Buffer>;
}
