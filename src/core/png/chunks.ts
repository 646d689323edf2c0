// src/core/png/chunks.ts

import type { IParsedPngChunk, IPngChunk, IPngHeader } from '../../@types/index.js';

import { crc32 } from 'crc';
import { PNG_SIGNATURE } from '../../config/index.js';

const CHUNK_OVERHEAD = 12; // length + type + crc
const IHDR_LENGTH = 13;

/**
 * Thrown when a byte stream cannot be read as a PNG chunk sequence.
 */
export class PngFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PngFormatError';
    }
}

/**
 * Checks whether the data starts with the 8-byte PNG signature.
 */
export function hasPngSignature(data: Uint8Array): boolean {
    return data.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((byte, index) => data[index] === byte);
}

/**
 * Computes the PNG CRC-32 over the chunk type and chunk data.
 *
 * @param {string} type - Four-character chunk type.
 * @param {Uint8Array} data - Chunk payload.
 * @return {number} Unsigned 32-bit checksum.
 */
export function chunkCrc(type: string, data: Uint8Array): number {
    const typeCrc = crc32(Buffer.from(type, 'latin1'));
    return crc32(Buffer.from(data.buffer, data.byteOffset, data.byteLength), typeCrc) >>> 0;
}

/**
 * Serializes one chunk as length, type, data and CRC.
 *
 * @param {IPngChunk} chunk - The chunk to write.
 * @return {Buffer} The serialized chunk.
 */
export function encodeChunk(chunk: IPngChunk): Buffer {
    if (!/^[A-Za-z]{4}$/.test(chunk.type)) {
        throw new PngFormatError(`Invalid chunk type "${chunk.type}"`);
    }
    const out = Buffer.alloc(CHUNK_OVERHEAD + chunk.data.length);
    out.writeUInt32BE(chunk.data.length, 0);
    out.write(chunk.type, 4, 'latin1');
    out.set(chunk.data, 8);
    out.writeUInt32BE(chunkCrc(chunk.type, chunk.data), 8 + chunk.data.length);
    return out;
}

/**
 * Serializes a complete PNG stream: the signature followed by every chunk in order.
 */
export function encodePng(chunks: IPngChunk[]): Buffer {
    return Buffer.concat([PNG_SIGNATURE, ...chunks.map(encodeChunk)]);
}

/**
 * Reads every chunk of a PNG stream up to and including IEND.
 * Each chunk reports whether its stored CRC matches its content; deciding what to do
 * with a corrupt chunk is left to the caller.
 *
 * @param {Uint8Array} data - The complete PNG file.
 * @return {IParsedPngChunk[]} The chunks in stream order.
 * @throws {PngFormatError} If the signature is missing or a chunk runs past the end of the data.
 */
export function parseChunks(data: Uint8Array): IParsedPngChunk[] {
    if (!hasPngSignature(data)) {
        throw new PngFormatError('Missing PNG signature');
    }
    const buffer = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    const chunks: IParsedPngChunk[] = [];
    let offset = PNG_SIGNATURE.length;

    while (offset < buffer.length) {
        if (offset + CHUNK_OVERHEAD > buffer.length) {
            throw new PngFormatError(`Truncated chunk header at offset ${offset}`);
        }
        const length = buffer.readUInt32BE(offset);
        const type = buffer.toString('latin1', offset + 4, offset + 8);
        const dataEnd = offset + 8 + length;
        if (dataEnd + 4 > buffer.length) {
            throw new PngFormatError(`Chunk "${type}" at offset ${offset} runs past the end of the file`);
        }
        const chunkData = new Uint8Array(buffer.subarray(offset + 8, dataEnd));
        const crc = buffer.readUInt32BE(dataEnd);
        chunks.push({ type, data: chunkData, crcValid: chunkCrc(type, chunkData) === crc });
        offset = dataEnd + 4;
        if (type === 'IEND') {
            return chunks;
        }
    }
    throw new PngFormatError('PNG stream ended without an IEND chunk');
}

/**
 * Lists chunk types in stream order.
 */
export function listChunkTypes(data: Uint8Array): string[] {
    return parseChunks(data).map((chunk) => chunk.type);
}

/**
 * Decodes the 13-byte IHDR payload.
 */
export function parseHeader(data: Uint8Array): IPngHeader {
    if (data.length !== IHDR_LENGTH) {
        throw new PngFormatError(`IHDR must be ${IHDR_LENGTH} bytes, got ${data.length}`);
    }
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    return {
        width: view.getUint32(0),
        height: view.getUint32(4),
        bitDepth: data[8],
        colorType: data[9],
        compressionMethod: data[10],
        filterMethod: data[11],
        interlaceMethod: data[12],
    };
}

/**
 * Encodes an IHDR payload.
 */
export function createHeaderData(header: IPngHeader): Uint8Array {
    const data = new Uint8Array(IHDR_LENGTH);
    const view = new DataView(data.buffer);
    view.setUint32(0, header.width);
    view.setUint32(4, header.height);
    data[8] = header.bitDepth;
    data[9] = header.colorType;
    data[10] = header.compressionMethod;
    data[11] = header.filterMethod;
    data[12] = header.interlaceMethod;
    return data;
}
