// src/core/png/chunkOrder.ts

import type { IParsedPngChunk, IPngChunk, IRestoredChunkOrder, ILogger } from '../../@types/index.js';

import { encodePng, parseChunks } from './chunks.js';
import { isInjectedChunkType, isStructuralChunkType } from './ancillary.js';

const TAIL_INJECTED_ORDER = ['eXIf', 'pHYs', 'sBIT'] as const;

/**
 * Checks a chunk type sequence against the screenshot layout
 * `IHDR, sRGB, <other>..., eXIf, pHYs, sBIT, IDAT..., IEND`.
 *
 * @param {string[]} types - Chunk types in stream order.
 * @return {string[]} Human-readable violations; empty when the order is correct.
 */
export function findChunkOrderViolations(types: string[]): string[] {
    const violations: string[] = [];
    const count = (type: string) => types.filter((candidate) => candidate === type).length;

    if (types[0] !== 'IHDR') violations.push(`first chunk is "${types[0]}", expected "IHDR"`);
    if (types[1] !== 'sRGB') violations.push(`second chunk is "${types[1]}", expected "sRGB"`);
    if (types[types.length - 1] !== 'IEND') {
        violations.push(`last chunk is "${types[types.length - 1]}", expected "IEND"`);
    }
    for (const type of ['IHDR', 'sRGB', ...TAIL_INJECTED_ORDER, 'IEND']) {
        const occurrences = count(type);
        if (occurrences !== 1) violations.push(`"${type}" occurs ${occurrences} times`);
    }

    const firstIdat = types.indexOf('IDAT');
    if (firstIdat === -1) {
        violations.push('no IDAT chunk');
        return violations;
    }
    const lastIdat = types.lastIndexOf('IDAT');
    if (types.slice(firstIdat, lastIdat + 1).some((type) => type !== 'IDAT')) {
        violations.push('IDAT chunks are not consecutive');
    }
    if (lastIdat !== types.length - 2) violations.push('IDAT is not followed directly by IEND');

    const tail = types.slice(firstIdat - TAIL_INJECTED_ORDER.length, firstIdat);
    if (tail.join(',') !== TAIL_INJECTED_ORDER.join(',')) {
        violations.push(`chunks before IDAT are "${tail.join(', ')}", expected "${TAIL_INJECTED_ORDER.join(', ')}"`);
    }
    return violations;
}

/**
 * Re-serializes a PNG in the screenshot chunk order after an external tool rewrote it.
 * Chunks the tool added land in the carried-over region, in the order they appear.
 * Duplicate injected chunks keep their first occurrence.
 *
 * @param {Uint8Array} png - The PNG as written by the metadata tool.
 * @param {ILogger} [logger] - Receives a debug line for every dropped duplicate.
 * @return {IRestoredChunkOrder} The reordered bytes, and whether anything moved.
 */
export function restoreChunkOrder(png: Uint8Array, logger?: ILogger): IRestoredChunkOrder {
    const parsed = parseChunks(png);
    let header: IParsedPngChunk | undefined;
    const injected = new Map<string, IPngChunk>();
    const carried: IPngChunk[] = [];
    const imageData: IPngChunk[] = [];

    for (const chunk of parsed) {
        const { type, data } = chunk;
        if (type === 'IHDR') {
            header ??= chunk;
        } else if (type === 'IDAT') {
            imageData.push({ type, data });
        } else if (isInjectedChunkType(type)) {
            if (injected.has(type)) {
                logger?.debug(`Dropping duplicate "${type}" chunk written by the metadata tool.`);
            } else {
                injected.set(type, { type, data });
            }
        } else if (!isStructuralChunkType(type)) {
            carried.push({ type, data });
        }
    }
    if (!header) {
        throw new Error('PNG has no IHDR chunk');
    }

    const pick = (type: string): IPngChunk[] => {
        const chunk = injected.get(type);
        return chunk ? [chunk] : [];
    };
    const ordered: IPngChunk[] = [
        { type: header.type, data: header.data },
        ...pick('sRGB'),
        ...carried,
        ...TAIL_INJECTED_ORDER.flatMap(pick),
        ...imageData,
        { type: 'IEND', data: new Uint8Array(0) },
    ];

    const before = parsed.map((chunk) => chunk.type).join(',');
    const after = ordered.map((chunk) => chunk.type).join(',');
    if (before === after) {
        return { bytes: png, changed: false };
    }
    return { bytes: encodePng(ordered), changed: true };
}
