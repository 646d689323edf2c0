// src/core/png/ancillary.ts

import type {
    AncillaryChunkSet,
    ILogger,
    InjectedChunkType,
    IParsedPngChunk,
    IPngHeader,
} from '../../@types/index.js';

import { INJECTED_CHUNK_TYPES, STRUCTURAL_CHUNK_TYPES } from './defaultChunks.js';

// Only the first frame is decoded, so animation control data would be dangling.
const ANIMATION_CHUNK_TYPES = ['acTL', 'fcTL', 'fdAT'];
// Payload layout depends on the colour type or bit depth of the source.
const COLOR_DEPENDENT_CHUNK_TYPES = ['tRNS', 'bKGD', 'hIST'];
const injectedTypes: readonly string[] = INJECTED_CHUNK_TYPES;
const structuralTypes: readonly string[] = STRUCTURAL_CHUNK_TYPES;

export function isInjectedChunkType(type: string): type is InjectedChunkType {
    return injectedTypes.includes(type);
}

export function isStructuralChunkType(type: string): boolean {
    return structuralTypes.includes(type);
}

/**
 * Splits the chunks of a source PNG into what the assembler carries over.
 *
 * Structural chunks are dropped. The first occurrence of each injected type is kept
 * aside for reuse; later duplicates are dropped. Chunks that cannot survive the
 * re-encoding (corrupt CRC, palette, animation, colour-dependent chunks when the output
 * colour model changed) are dropped too. Everything else keeps its relative order.
 *
 * @param {IParsedPngChunk[]} chunks - Every chunk of the source, in stream order.
 * @param {IPngHeader} sourceHeader - Source IHDR.
 * @param {Pick<IPngHeader, 'colorType' | 'bitDepth'>} outputHeader - Colour model the output will use.
 * @param {ILogger} logger - Logger for dropped-chunk diagnostics.
 * @return {AncillaryChunkSet} The retained and preserved chunks.
 */
export function extractAncillaryChunks(
    chunks: IParsedPngChunk[],
    sourceHeader: IPngHeader,
    outputHeader: Pick<IPngHeader, 'colorType' | 'bitDepth'>,
    logger: ILogger,
): AncillaryChunkSet {
    const colorModelChanged = sourceHeader.colorType !== outputHeader.colorType ||
        sourceHeader.bitDepth !== outputHeader.bitDepth;
    const result: AncillaryChunkSet = { chunks: [], preserved: {} };

    for (const chunk of chunks) {
        const { type } = chunk;
        if (isStructuralChunkType(type)) {
            continue;
        }
        if (!chunk.crcValid) {
            logger.warn(`Dropping "${type}" chunk with a bad CRC.`);
            continue;
        }
        if (isInjectedChunkType(type)) {
            if (result.preserved[type]) {
                logger.debug(`Dropping duplicate "${type}" chunk.`);
            } else {
                result.preserved[type] = chunk.data;
            }
            continue;
        }
        if (type === 'PLTE' || ANIMATION_CHUNK_TYPES.includes(type)) {
            logger.debug(`Dropping "${type}" chunk, not applicable to the re-encoded image.`);
            continue;
        }
        if (colorModelChanged && COLOR_DEPENDENT_CHUNK_TYPES.includes(type)) {
            logger.debug(`Dropping "${type}" chunk, colour model changed during decoding.`);
            continue;
        }
        result.chunks.push({ type, data: chunk.data });
    }
    return result;
}

export function emptyAncillaryChunkSet(): AncillaryChunkSet {
    return { chunks: [], preserved: {} };
}
