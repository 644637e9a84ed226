import { ENCODING_DEFAULTS } from '../config/constants.js';
import { FORMAT_TRAITS } from '../types/config.types.js';
import type { IImageCodec } from '../types/codec.types.js';
import type { OutputFormat, TransformStage } from '../types/enums.js';
import { hasAlpha, type RasterImage } from '../types/raster.types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Inputs that gate the transform steps
 */
export interface TransformContext {
    format: OutputFormat;
    grayscale: boolean;
    maxDimension?: number;
}

/**
 * One gated step of the chain
 */
export interface TransformStep {
    stage: TransformStage;
    applies(image: RasterImage, context: TransformContext): boolean;
    apply(image: RasterImage, context: TransformContext, codec: IImageCodec): Promise<RasterImage>;
}

/**
 * Target size for a shrink-only cap on the larger side, or null when the
 * image already fits.
 */
export function computeDownscaleSize(
    width: number,
    height: number,
    maxDimension: number
): { width: number; height: number } | null {
    const larger = Math.max(width, height);
    if (larger <= maxDimension) {
        return null;
    }
    const ratio = maxDimension / larger;
    return {
        width: width >= height ? maxDimension : Math.max(1, Math.round(width * ratio)),
        height: height > width ? maxDimension : Math.max(1, Math.round(height * ratio)),
    };
}

const flattenStep: TransformStep = {
    stage: 'flatten',
    applies: (_image, context) => !FORMAT_TRAITS[context.format].supportsAlpha,
    apply: async (image, _context, codec) => {
        if (hasAlpha(image.mode)) {
            return codec.flatten(image, ENCODING_DEFAULTS.FLATTEN_BACKGROUND);
        }
        if (image.mode !== 'rgb') {
            return codec.toRgb(image);
        }
        return image;
    },
};

const grayscaleStep: TransformStep = {
    stage: 'grayscale',
    applies: (_image, context) => context.grayscale,
    apply: (image, _context, codec) => codec.toGrayscale(image),
};

const downscaleStep: TransformStep = {
    stage: 'downscale',
    applies: (image, context) =>
        context.maxDimension !== undefined &&
        computeDownscaleSize(image.width, image.height, context.maxDimension) !== null,
    apply: async (image, context, codec) => {
        const size = context.maxDimension === undefined
            ? null
            : computeDownscaleSize(image.width, image.height, context.maxDimension);
        return size ? codec.resize(image, size.width, size.height) : image;
    },
};

/**
 * Fixed application order: flatten, then grayscale, then downscale
 */
export const TRANSFORM_STEPS: readonly TransformStep[] = Object.freeze([
    flattenStep,
    grayscaleStep,
    downscaleStep,
]);

/**
 * Transform engine: runs the ordered, gated steps over one page image
 */
export class TransformEngine {
    private readonly codec: IImageCodec;
    private readonly logger: Logger;
    private readonly steps: readonly TransformStep[];

    constructor(codec: IImageCodec, logger: Logger, steps: readonly TransformStep[] = TRANSFORM_STEPS) {
        this.codec = codec;
        this.logger = logger;
        this.steps = steps;
    }

    /**
     * Stages that would run for this image, in order
     */
    plan(image: RasterImage, context: TransformContext): TransformStage[] {
        return this.steps.filter((step) => step.applies(image, context)).map((step) => step.stage);
    }

    async apply(image: RasterImage, context: TransformContext): Promise<RasterImage> {
        let current = image;
        for (const step of this.steps) {
            if (!step.applies(current, context)) {
                continue;
            }
            current = await step.apply(current, context, this.codec);
            this.logger.debug('Transform applied', {
                stage: step.stage,
                mode: current.mode,
                width: current.width,
                height: current.height,
            });
        }
        return current;
    }
}
