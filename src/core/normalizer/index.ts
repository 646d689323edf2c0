// src/core/normalizer/index.ts

import type { IDecodedImage, IFileTimes, ILogger, ISourceImage } from '../../@types/index.js';

import path from 'node:path';
import { readBufferFromFile } from '../../utils/storage/storageUtils.js';
import { decodeImageData } from '../imageProcessing/processor.js';
import { SupportedImageProcessorStrategies } from '../imageProcessing/imageProcessorStrategies.js';
import { extractAncillaryChunks, emptyAncillaryChunkSet } from '../png/ancillary.js';
import { parseChunks, parseHeader } from '../png/chunks.js';
import { colorTypeForChannels } from '../png/defaultChunks.js';
import { DecodeError, describeError } from '../errors.js';
import { defaultFileTimes } from '../timestamp/fileTimes.js';

const JPEG_EXTENSIONS = ['.jpg', '.jpeg'];

/**
 * Reads the source's modification time. Called before anything else touches the file.
 *
 * @throws {DecodeError} If the file cannot be stat'ed.
 */
export async function captureSourceTimestamp(
    inputFile: string,
    fileTimes: IFileTimes = defaultFileTimes,
): Promise<Date> {
    try {
        return await fileTimes.getModificationTime(inputFile);
    } catch (error) {
        throw new DecodeError(`Cannot read "${inputFile}": ${describeError(error)}`, inputFile, { cause: error });
    }
}

/**
 * Decodes an encoded image into a raster and, for PNG input, the chunks to carry over.
 *
 * @param {Uint8Array} data - Encoded PNG or JPEG.
 * @param {string} inputFile - Used in diagnostics and error reports.
 * @param {ILogger} logger - Logger instance.
 * @param {SupportedImageProcessorStrategies} [processorStrategy] - Decoder to use.
 * @return {Promise<Omit<ISourceImage, 'mtime'>>} Raster, format, carried-over chunks.
 * @throws {DecodeError} If the data is not a decodable PNG or JPEG.
 */
export async function normalizeImage(
    data: Uint8Array,
    inputFile: string,
    logger: ILogger,
    processorStrategy: SupportedImageProcessorStrategies = SupportedImageProcessorStrategies.Sharp,
): Promise<Omit<ISourceImage, 'mtime'>> {
    let decoded: IDecodedImage;
    try {
        decoded = await decodeImageData(data, processorStrategy);
    } catch (error) {
        throw new DecodeError(`Cannot decode "${inputFile}": ${describeError(error)}`, inputFile, { cause: error });
    }
    const { raster, format } = decoded;

    const extension = path.extname(inputFile).toLowerCase();
    const expectedFormat = extension === '.png' ? 'png' : JPEG_EXTENSIONS.includes(extension) ? 'jpeg' : undefined;
    if (expectedFormat && expectedFormat !== format) {
        logger.debug(`"${path.basename(inputFile)}" contains ${format.toUpperCase()} data despite its extension.`);
    }

    if (format === 'jpeg') {
        return { raster, format, ancillary: emptyAncillaryChunkSet() };
    }

    try {
        const chunks = parseChunks(data);
        const headerChunk = chunks[0];
        if (headerChunk?.type !== 'IHDR') {
            throw new Error('first chunk is not IHDR');
        }
        const sourceHeader = parseHeader(headerChunk.data);
        const ancillary = extractAncillaryChunks(
            chunks,
            sourceHeader,
            { colorType: colorTypeForChannels(raster.channels), bitDepth: 8 },
            logger,
        );
        logger.debug(
            `Carrying over ${ancillary.chunks.length} chunk(s); preserving ${
                Object.keys(ancillary.preserved).join(', ') || 'none'
            } of the injected set.`,
        );
        return { raster, format, ancillary, sourceHeader };
    } catch (error) {
        throw new DecodeError(
            `Cannot read PNG chunks of "${inputFile}": ${describeError(error)}`,
            inputFile,
            { cause: error },
        );
    }
}

/**
 * Format Normalizer entry point: captures the source mtime, then reads and decodes the file.
 *
 * @param {string} inputFile - Path to a PNG or JPEG.
 * @param {ILogger} logger - Logger instance.
 * @param {IFileTimes} [fileTimes] - Filesystem collaborator for the mtime.
 * @return {Promise<ISourceImage>} The normalized source.
 * @throws {DecodeError} If the file cannot be read or decoded.
 */
export async function loadSourceImage(
    inputFile: string,
    logger: ILogger,
    fileTimes: IFileTimes = defaultFileTimes,
): Promise<ISourceImage> {
    const mtime = await captureSourceTimestamp(inputFile, fileTimes);
    return { ...(await normalizeSourceFile(inputFile, logger)), mtime };
}

/**
 * Reads a file from disk and normalizes it.
 *
 * @throws {DecodeError} If the file cannot be read or decoded.
 */
export async function normalizeSourceFile(inputFile: string, logger: ILogger): Promise<Omit<ISourceImage, 'mtime'>> {
    let data: Buffer;
    try {
        data = await readBufferFromFile(inputFile);
    } catch (error) {
        throw new DecodeError(`Cannot read "${inputFile}": ${describeError(error)}`, inputFile, { cause: error });
    }
    return await normalizeImage(data, inputFile, logger);
}
