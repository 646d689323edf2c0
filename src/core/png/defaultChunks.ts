// src/core/png/defaultChunks.ts

import type { ChannelCount } from '../../@types/index.js';

export const STRUCTURAL_CHUNK_TYPES = ['IHDR', 'IDAT', 'IEND'] as const;
export const INJECTED_CHUNK_TYPES = ['sRGB', 'eXIf', 'pHYs', 'sBIT'] as const;

const PHYS_UNIT_METER = 1;

const COLOR_TYPE_BY_CHANNELS: Record<ChannelCount, number> = {
    1: 0, // greyscale
    2: 4, // greyscale + alpha
    3: 2, // truecolour
    4: 6, // truecolour + alpha
};

/**
 * Maps an interleaved channel count to the PNG colour type used for 8-bit output.
 */
export function colorTypeForChannels(channels: ChannelCount): number {
    return COLOR_TYPE_BY_CHANNELS[channels];
}

export function isChannelCount(value: number): value is ChannelCount {
    return value === 1 || value === 2 || value === 3 || value === 4;
}

export function createSrgbData(renderingIntent: number): Uint8Array {
    return Uint8Array.of(renderingIntent);
}

/**
 * pHYs payload: pixels per unit on both axes followed by the unit specifier.
 */
export function createPhysData(pixelsPerMeter: number): Uint8Array {
    const data = new Uint8Array(9);
    const view = new DataView(data.buffer);
    view.setUint32(0, pixelsPerMeter);
    view.setUint32(4, pixelsPerMeter);
    data[8] = PHYS_UNIT_METER;
    return data;
}

export function createSbitData(channels: ChannelCount, significantBits: number): Uint8Array {
    return new Uint8Array(channels).fill(significantBits);
}

/**
 * Smallest well-formed eXIf payload: a big-endian TIFF header pointing at an IFD0 with
 * no entries and no next IFD. The metadata tool fills in the real tags later.
 */
export function createMinimalExifData(): Uint8Array {
    return Uint8Array.of(
        0x4d, 0x4d, 0x00, 0x2a, // "MM", 42
        0x00, 0x00, 0x00, 0x08, // IFD0 offset
        0x00, 0x00, // entry count
        0x00, 0x00, 0x00, 0x00, // next IFD
    );
}

/**
 * A carried-over sBIT is only meaningful if it has one entry per output channel and
 * every entry fits the output bit depth.
 */
export function isSbitCompatible(data: Uint8Array, channels: ChannelCount, bitDepth: number): boolean {
    return data.length === channels && data.every((bits) => bits >= 1 && bits <= bitDepth);
}
