// tests/assembler.test.ts

import type { AncillaryChunkSet } from '../src/@types/index.js';

import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import { assemblePng } from '../src/core/png/assembler.js';
import { listChunkTypes, parseChunks, parseHeader } from '../src/core/png/chunks.js';
import { emptyAncillaryChunkSet } from '../src/core/png/ancillary.js';
import { AssemblyError } from '../src/core/errors.js';
import { MockLogger } from './helpers/mockLogger.js';
import { chunkData, expandGreyAlpha, patternRaster, readPixels, textChunk } from './helpers/pngFixtures.js';

const MINIMAL_EXIF = [0x4d, 0x4d, 0x00, 0x2a, 0x00, 0x00, 0x00, 0x08, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00];
// 5669 pixels per metre on both axes, unit metre
const DEFAULT_PHYS = [0x00, 0x00, 0x16, 0x25, 0x00, 0x00, 0x16, 0x25, 0x01];

describe('PNG assembler', () => {
    it('writes the screenshot chunk layout with defaults for a source without ancillary chunks', async () => {
        const raster = patternRaster(4, 3, 4);
        const png = await assemblePng(raster, emptyAncillaryChunkSet());

        expect(listChunkTypes(png)).toEqual(['IHDR', 'sRGB', 'eXIf', 'pHYs', 'sBIT', 'IDAT', 'IEND']);
        expect(parseHeader(parseChunks(png)[0].data)).toEqual({
            width: 4,
            height: 3,
            bitDepth: 8,
            colorType: 6,
            compressionMethod: 0,
            filterMethod: 0,
            interlaceMethod: 0,
        });
        expect(chunkData(png, 'sRGB')).toEqual([0]);
        expect(chunkData(png, 'eXIf')).toEqual(MINIMAL_EXIF);
        expect(chunkData(png, 'pHYs')).toEqual(DEFAULT_PHYS);
        expect(chunkData(png, 'sBIT')).toEqual([8, 8, 8, 8]);
    });

    it('encodes the pixels losslessly', async () => {
        for (const channels of [1, 3, 4] as const) {
            const raster = patternRaster(9, 6, channels);
            const png = await assemblePng(raster, emptyAncillaryChunkSet());
            expect(await readPixels(png)).toEqual(Buffer.from(raster.data));
        }
        // grey with alpha is compared as RGBA
        const greyAlpha = patternRaster(9, 6, 2);
        const rgba = await sharp(await assemblePng(greyAlpha, emptyAncillaryChunkSet()))
            .toColourspace('srgb')
            .raw()
            .toBuffer();
        expect(rgba).toEqual(Buffer.from(expandGreyAlpha(greyAlpha.data)));
    });

    it('maps channel counts to PNG colour types', async () => {
        const colorTypes: number[] = [];
        for (const channels of [1, 2, 3, 4] as const) {
            const png = await assemblePng(patternRaster(2, 2, channels), emptyAncillaryChunkSet());
            colorTypes.push(parseHeader(parseChunks(png)[0].data).colorType);
        }
        expect(colorTypes).toEqual([0, 4, 2, 6]);
    });

    it('reuses source chunks of the injected set and places carried chunks after sRGB', async () => {
        const ancillary: AncillaryChunkSet = {
            chunks: [textChunk('Author', 'Alice'), { type: 'gAMA', data: Uint8Array.of(0, 0, 0xb1, 0x8f) }],
            preserved: {
                sRGB: Uint8Array.of(2),
                pHYs: Uint8Array.of(0, 0, 0x0b, 0x13, 0, 0, 0x0b, 0x13, 1),
            },
        };
        const png = await assemblePng(patternRaster(3, 3, 3), ancillary);

        expect(listChunkTypes(png)).toEqual(['IHDR', 'sRGB', 'tEXt', 'gAMA', 'eXIf', 'pHYs', 'sBIT', 'IDAT', 'IEND']);
        expect(chunkData(png, 'sRGB')).toEqual([2]);
        expect(chunkData(png, 'pHYs')).toEqual([0, 0, 0x0b, 0x13, 0, 0, 0x0b, 0x13, 1]);
        expect(chunkData(png, 'eXIf')).toEqual(MINIMAL_EXIF);
        expect(chunkData(png, 'sBIT')).toEqual([8, 8, 8]);
    });

    it('writes a carried-over eXIf payload byte for byte', async () => {
        // little-endian TIFF header, one IFD entry: Orientation (0x0112) SHORT 1 = 6
        const exif = Uint8Array.of(
            0x49, 0x49, 0x2a, 0x00, 0x08, 0x00, 0x00, 0x00,
            0x01, 0x00,
            0x12, 0x01, 0x03, 0x00, 0x01, 0x00, 0x00, 0x00, 0x06, 0x00, 0x00, 0x00,
            0x00, 0x00, 0x00, 0x00,
        );
        const ancillary: AncillaryChunkSet = { chunks: [], preserved: { eXIf: exif } };

        const png = await assemblePng(patternRaster(2, 2, 3), ancillary);

        expect(listChunkTypes(png)).toEqual(['IHDR', 'sRGB', 'eXIf', 'pHYs', 'sBIT', 'IDAT', 'IEND']);
        expect(chunkData(png, 'eXIf')).toEqual(Array.from(exif));
    });

    it('keeps a compatible source sBIT', async () => {
        const ancillary: AncillaryChunkSet = { chunks: [], preserved: { sBIT: Uint8Array.of(5, 6, 5) } };
        const png = await assemblePng(patternRaster(2, 2, 3), ancillary);
        expect(chunkData(png, 'sBIT')).toEqual([5, 6, 5]);
    });

    it('replaces a source sBIT that does not fit the output colour type', async () => {
        const logger = new MockLogger();
        const ancillary: AncillaryChunkSet = { chunks: [], preserved: { sBIT: Uint8Array.of(5, 6, 5) } };
        const png = await assemblePng(patternRaster(2, 2, 4), ancillary, { logger });
        expect(chunkData(png, 'sBIT')).toEqual([8, 8, 8, 8]);
        expect(logger.debugMessages).toEqual([
            'Source sBIT does not fit the output colour type, writing the default instead.',
        ]);
    });

    it('replaces a source sBIT holding a zero entry', async () => {
        const ancillary: AncillaryChunkSet = { chunks: [], preserved: { sBIT: Uint8Array.of(0) } };
        const png = await assemblePng(patternRaster(2, 2, 1), ancillary);
        expect(chunkData(png, 'sBIT')).toEqual([8]);
    });

    it('splits the compressed stream into consecutive IDAT chunks', async () => {
        const raster = patternRaster(32, 32, 4);
        const png = await assemblePng(raster, emptyAncillaryChunkSet(), { idatChunkSize: 8 });
        const types = listChunkTypes(png);
        const idatCount = types.filter((type) => type === 'IDAT').length;

        expect(idatCount).toBeGreaterThan(1);
        expect(types.slice(5)).toEqual([...new Array<string>(idatCount).fill('IDAT'), 'IEND']);
        expect(parseChunks(png).filter((chunk) => chunk.type === 'IDAT').every((chunk) => chunk.data.length <= 8)).toBe(true);
        expect(await readPixels(png)).toEqual(Buffer.from(raster.data));
    });

    it('rejects a pixel buffer that does not match the dimensions', async () => {
        const raster = { ...patternRaster(2, 2, 3), data: new Uint8Array(11) };
        const failure = assemblePng(raster, emptyAncillaryChunkSet());
        await expect(failure).rejects.toBeInstanceOf(AssemblyError);
        await expect(failure).rejects.toThrow('Pixel buffer holds 11 bytes, expected 12');
    });

    it('rejects empty dimensions', async () => {
        const raster = { data: new Uint8Array(0), width: 0, height: 2, channels: 3 as const };
        await expect(assemblePng(raster, emptyAncillaryChunkSet())).rejects.toThrow('Invalid image width: 0');
    });
});
