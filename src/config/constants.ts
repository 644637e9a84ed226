/**
 * System constants for the page exporter
 * Centralizes magic numbers for maintainability
 */

// ============================================
// Rendering
// ============================================

export const RENDER_DEFAULTS = {
    /**
     * Page geometry unit: PDF user space has 72 units per inch,
     * so a render scale of dpi / 72 yields `dpi` pixels per inch
     */
    REFERENCE_DPI: 72,

    DPI: 300,
} as const;

// ============================================
// Encoding
// ============================================

export const ENCODING_DEFAULTS = {
    /** Quality for lossy formats (jpg, webp) */
    QUALITY: 92,

    MIN_QUALITY: 1,
    MAX_QUALITY: 100,

    /** zlib level for PNG, 9 = smallest output */
    PNG_COMPRESSION_LEVEL: 9,

    /** libwebp effort (method), 6 = slowest / best compression */
    WEBP_EFFORT: 6,

    /** Background used when flattening transparency */
    FLATTEN_BACKGROUND: { r: 255, g: 255, b: 255 },
} as const;

// ============================================
// Output naming
// ============================================

export const OUTPUT_DEFAULTS = {
    FORMAT: 'jpg',
    FILENAME_TEMPLATE: '{stem}_p{page:03d}',
    OVERWRITE: true,
} as const;

// ============================================
// Process exit codes
// ============================================

export const EXIT_CODES = {
    SUCCESS: 0,
    FAILURE: 1,
    /** 128 + SIGINT */
    INTERRUPTED: 130,
} as const;

// ============================================
// Type exports for type-safe access
// ============================================

export type RenderDefaults = typeof RENDER_DEFAULTS;
export type EncodingDefaults = typeof ENCODING_DEFAULTS;
export type OutputDefaults = typeof OUTPUT_DEFAULTS;
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
