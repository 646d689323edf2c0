// src/core/png/assembler.ts

import type {
    AncillaryChunkSet,
    ILogger,
    IParsedPngChunk,
    IPngChunk,
    IPngHeader,
    IRasterImage,
} from '../../@types/index.js';

import { config } from '../../config/index.js';
import { describeError, AssemblyError } from '../errors.js';
import { encodeImageData } from '../imageProcessing/processor.js';
import { SupportedImageProcessorStrategies } from '../imageProcessing/imageProcessorStrategies.js';
import { createHeaderData, encodePng, parseChunks, parseHeader } from './chunks.js';
import {
    colorTypeForChannels,
    createMinimalExifData,
    createPhysData,
    createSbitData,
    createSrgbData,
    isChannelCount,
    isSbitCompatible,
} from './defaultChunks.js';

const OUTPUT_BIT_DEPTH = 8;
const MAX_DIMENSION = 0x7fffffff;

export interface IAssembleOptions {
    idatChunkSize?: number;
    processorStrategy?: SupportedImageProcessorStrategies;
    logger?: ILogger;
}

function assertAssemblable(raster: IRasterImage): void {
    const { width, height, channels, data } = raster;
    for (const [name, value] of [['width', width], ['height', height]] as const) {
        if (!Number.isInteger(value) || value <= 0 || value > MAX_DIMENSION) {
            throw new AssemblyError(`Invalid image ${name}: ${value}`);
        }
    }
    if (!isChannelCount(channels)) {
        throw new AssemblyError(`Unsupported channel count: ${channels}`);
    }
    const expected = width * height * channels;
    if (data.length !== expected) {
        throw new AssemblyError(`Pixel buffer holds ${data.length} bytes, expected ${expected}`);
    }
}

/**
 * Encodes the raster and returns its image data re-split into IDAT chunks of at most
 * `idatChunkSize` bytes. Everything else the encoder wrote is discarded.
 *
 * @throws {AssemblyError} If the encoder fails or its header does not describe the raster.
 */
export async function createImageDataChunks(
    raster: IRasterImage,
    idatChunkSize: number,
    processorStrategy: SupportedImageProcessorStrategies = SupportedImageProcessorStrategies.Sharp,
): Promise<IPngChunk[]> {
    let chunks: IParsedPngChunk[];
    let header: IPngHeader;
    try {
        chunks = parseChunks(await encodeImageData(raster, processorStrategy));
        header = parseHeader(chunks[0].data);
    } catch (error) {
        throw new AssemblyError(`Cannot encode pixels: ${describeError(error)}`, undefined, { cause: error });
    }
    const colorType = colorTypeForChannels(raster.channels);
    if (
        header.width !== raster.width || header.height !== raster.height ||
        header.bitDepth !== OUTPUT_BIT_DEPTH || header.colorType !== colorType || header.interlaceMethod !== 0
    ) {
        throw new AssemblyError(
            `Encoder wrote ${header.width}x${header.height}, depth ${header.bitDepth}, colour type ${header.colorType}; ` +
                `expected ${raster.width}x${raster.height}, depth ${OUTPUT_BIT_DEPTH}, colour type ${colorType}`,
        );
    }

    const imageData = Buffer.concat(chunks.filter((chunk) => chunk.type === 'IDAT').map((chunk) => chunk.data));
    const out: IPngChunk[] = [];
    for (let offset = 0; offset < imageData.length; offset += idatChunkSize) {
        out.push({ type: 'IDAT', data: imageData.subarray(offset, offset + idatChunkSize) });
    }
    return out;
}

/**
 * Builds a PNG stream whose chunk order is
 * `IHDR, sRGB, <carried-over chunks>, eXIf, pHYs, sBIT, IDAT..., IEND`.
 *
 * sRGB, eXIf, pHYs and sBIT reuse the source's bytes when the source had them and
 * fall back to screenshot defaults otherwise. A carried-over sBIT that does not fit
 * the output colour type is replaced by the default.
 *
 * @param {IRasterImage} raster - Decoded 8-bit pixels.
 * @param {AncillaryChunkSet} ancillary - Chunks carried over from the source.
 * @param {IAssembleOptions} [options] - IDAT size and encoder; defaults come from `config`.
 * @return {Promise<Buffer>} The complete PNG file.
 * @throws {AssemblyError} If the raster is invalid or cannot be encoded.
 */
export async function assemblePng(
    raster: IRasterImage,
    ancillary: AncillaryChunkSet,
    options: IAssembleOptions = {},
): Promise<Buffer> {
    assertAssemblable(raster);
    const { idatChunkSize = config.png.idatChunkSize, processorStrategy, logger } = options;
    const imageData = await createImageDataChunks(raster, idatChunkSize, processorStrategy);
    const { screenshot } = config;
    const { preserved } = ancillary;

    let sbit = preserved.sBIT;
    if (sbit && !isSbitCompatible(sbit, raster.channels, OUTPUT_BIT_DEPTH)) {
        logger?.debug('Source sBIT does not fit the output colour type, writing the default instead.');
        sbit = undefined;
    }

    const header: IPngChunk = {
        type: 'IHDR',
        data: createHeaderData({
            width: raster.width,
            height: raster.height,
            bitDepth: OUTPUT_BIT_DEPTH,
            colorType: colorTypeForChannels(raster.channels),
            compressionMethod: 0,
            filterMethod: 0,
            interlaceMethod: 0,
        }),
    };

    return encodePng([
        header,
        { type: 'sRGB', data: preserved.sRGB ?? createSrgbData(screenshot.srgbRenderingIntent) },
        ...ancillary.chunks,
        { type: 'eXIf', data: preserved.eXIf ?? createMinimalExifData() },
        { type: 'pHYs', data: preserved.pHYs ?? createPhysData(screenshot.pixelsPerMeter) },
        { type: 'sBIT', data: sbit ?? createSbitData(raster.channels, screenshot.significantBits) },
        ...imageData,
        { type: 'IEND', data: new Uint8Array(0) },
    ]);
}
