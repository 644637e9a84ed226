/**
 * Output format enumeration
 * Canonical formats after alias normalization ("jpeg" becomes "jpg")
 */
export const OutputFormatEnum = {
    JPG: 'jpg',
    PNG: 'png',
    WEBP: 'webp',
} as const;

export type OutputFormat = (typeof OutputFormatEnum)[keyof typeof OutputFormatEnum];

/**
 * Every spelling accepted on input, aliases included
 */
export const FORMAT_ALIASES: Readonly<Record<string, OutputFormat>> = {
    jpg: OutputFormatEnum.JPG,
    jpeg: OutputFormatEnum.JPG,
    png: OutputFormatEnum.PNG,
    webp: OutputFormatEnum.WEBP,
};

/**
 * Color mode of an in-memory raster
 */
export const ColorModeEnum = {
    RGB: 'rgb',
    RGBA: 'rgba',
    GRAY: 'gray',
} as const;

export type ColorMode = (typeof ColorModeEnum)[keyof typeof ColorModeEnum];

/**
 * Transform chain stages, in application order
 */
export const TransformStageEnum = {
    FLATTEN: 'flatten',
    GRAYSCALE: 'grayscale',
    DOWNSCALE: 'downscale',
} as const;

export type TransformStage = (typeof TransformStageEnum)[keyof typeof TransformStageEnum];
