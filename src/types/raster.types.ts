import type { ColorMode } from './enums.js';

/**
 * Interleaved 8-bit pixel buffer for one page
 */
export interface RasterImage {
    /** Row-major samples, `channels` bytes per pixel, no row padding */
    data: Buffer;
    width: number;
    height: number;
    mode: ColorMode;
}

export type Channels = 1 | 3 | 4;

export const CHANNELS_BY_MODE: Readonly<Record<ColorMode, Channels>> = {
    gray: 1,
    rgb: 3,
    rgba: 4,
};

export function channelsOf(mode: ColorMode): Channels {
    return CHANNELS_BY_MODE[mode];
}

export function hasAlpha(mode: ColorMode): boolean {
    return mode === 'rgba';
}

/**
 * Inverse of CHANNELS_BY_MODE; undefined for counts no mode uses
 */
export function modeForChannels(channels: number): ColorMode | undefined {
    switch (channels) {
        case 1:
            return 'gray';
        case 3:
            return 'rgb';
        case 4:
            return 'rgba';
        default:
            return undefined;
    }
}
