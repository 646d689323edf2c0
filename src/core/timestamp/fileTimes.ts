// src/core/timestamp/fileTimes.ts

import type { IFileTimes } from '../../@types/index.js';

import fs from 'node:fs/promises';
import { describeError, TimestampError } from '../errors.js';

/**
 * Reads and sets file times through `node:fs/promises`.
 */
export class NodeFileTimes implements IFileTimes {
    public async getModificationTime(filePath: string): Promise<Date> {
        const stats = await fs.stat(filePath);
        return stats.mtime;
    }

    public async setModificationTime(filePath: string, mtime: Date): Promise<void> {
        await fs.utimes(filePath, mtime, mtime);
    }
}

export const defaultFileTimes: IFileTimes = new NodeFileTimes();

/**
 * Sets the output's access and modification times to the source's original mtime.
 * Must run after the last write to the output, or the write would bump the mtime again.
 *
 * @param {string} outputFile - The converted file.
 * @param {Date} sourceMtime - Modification time captured before the source was read.
 * @param {IFileTimes} [fileTimes] - Filesystem collaborator.
 * @throws {TimestampError} If the filesystem rejects the change.
 */
export async function preserveTimestamp(
    outputFile: string,
    sourceMtime: Date,
    fileTimes: IFileTimes = defaultFileTimes,
): Promise<void> {
    try {
        await fileTimes.setModificationTime(outputFile, sourceMtime);
    } catch (error) {
        throw new TimestampError(
            `Could not set modification time of "${outputFile}": ${describeError(error)}`,
            outputFile,
            { cause: error },
        );
    }
}
