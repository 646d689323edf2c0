// tests/ancillary.test.ts

import type { IParsedPngChunk, IPngHeader } from '../src/@types/index.js';

import { describe, expect, it } from 'vitest';
import { extractAncillaryChunks } from '../src/core/png/ancillary.js';
import { MockLogger } from './helpers/mockLogger.js';

const rgbHeader: IPngHeader = {
    width: 2,
    height: 2,
    bitDepth: 8,
    colorType: 2,
    compressionMethod: 0,
    filterMethod: 0,
    interlaceMethod: 0,
};

function chunk(type: string, bytes: number[], crcValid = true): IParsedPngChunk {
    return { type, data: Uint8Array.from(bytes), crcValid };
}

describe('Ancillary chunk extraction', () => {
    it('keeps carried chunks in source order and sets the injected types aside', () => {
        const logger = new MockLogger();
        const result = extractAncillaryChunks(
            [
                chunk('IHDR', [0]),
                chunk('gAMA', [0, 0, 0xb1, 0x8f]),
                chunk('sRGB', [1]),
                chunk('tEXt', [0x41]),
                chunk('pHYs', [1, 2, 3]),
                chunk('IDAT', [7]),
                chunk('zTXt', [0x42]),
                chunk('IEND', []),
            ],
            rgbHeader,
            { colorType: 2, bitDepth: 8 },
            logger,
        );

        expect(result.chunks.map((carried) => carried.type)).toEqual(['gAMA', 'tEXt', 'zTXt']);
        expect(result.preserved).toEqual({ sRGB: Uint8Array.of(1), pHYs: Uint8Array.of(1, 2, 3) });
    });

    it('keeps the first occurrence of a duplicated injected chunk', () => {
        const logger = new MockLogger();
        const result = extractAncillaryChunks(
            [chunk('eXIf', [1]), chunk('eXIf', [2])],
            rgbHeader,
            { colorType: 2, bitDepth: 8 },
            logger,
        );
        expect(result.preserved.eXIf).toEqual(Uint8Array.of(1));
        expect(logger.debugMessages).toEqual(['Dropping duplicate "eXIf" chunk.']);
    });

    it('drops chunks with a bad CRC and warns about them', () => {
        const logger = new MockLogger();
        const result = extractAncillaryChunks(
            [chunk('tEXt', [0x41], false), chunk('sRGB', [0], false)],
            rgbHeader,
            { colorType: 2, bitDepth: 8 },
            logger,
        );
        expect(result).toEqual({ chunks: [], preserved: {} });
        expect(logger.warnMessages).toEqual([
            'Dropping "tEXt" chunk with a bad CRC.',
            'Dropping "sRGB" chunk with a bad CRC.',
        ]);
    });

    it('drops palette and animation chunks', () => {
        const result = extractAncillaryChunks(
            [chunk('PLTE', [0, 0, 0]), chunk('acTL', [0]), chunk('fcTL', [0]), chunk('fdAT', [0]), chunk('iTXt', [1])],
            rgbHeader,
            { colorType: 2, bitDepth: 8 },
            new MockLogger(),
        );
        expect(result.chunks.map((carried) => carried.type)).toEqual(['iTXt']);
    });

    it('keeps colour-dependent chunks while the colour model is unchanged', () => {
        const result = extractAncillaryChunks(
            [chunk('tRNS', [0, 1, 0, 2, 0, 3]), chunk('bKGD', [0, 0, 0, 0, 0, 0])],
            rgbHeader,
            { colorType: 2, bitDepth: 8 },
            new MockLogger(),
        );
        expect(result.chunks.map((carried) => carried.type)).toEqual(['tRNS', 'bKGD']);
    });

    it('drops colour-dependent chunks when decoding changed the colour model', () => {
        const paletteHeader: IPngHeader = { ...rgbHeader, colorType: 3 };
        const result = extractAncillaryChunks(
            [chunk('tRNS', [0]), chunk('bKGD', [0]), chunk('hIST', [0, 1]), chunk('tIME', [7, 0xe8, 1, 2, 3, 4, 5])],
            paletteHeader,
            { colorType: 6, bitDepth: 8 },
            new MockLogger(),
        );
        expect(result.chunks.map((carried) => carried.type)).toEqual(['tIME']);
    });
});
