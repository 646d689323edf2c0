// src/utils/storage/storageUtils.ts

import fs from 'node:fs/promises';
import path from 'node:path';

/**
 * Ensures that the specified output directory exists. If the directory
 * does not exist, it creates the directory and any necessary subdirectories.
 *
 * @param {string} outputFolder - The path of the output directory to ensure.
 */
export async function ensureOutputDirectory(outputFolder: string): Promise<void> {
    await fs.mkdir(outputFolder, { recursive: true });
}

/**
 * Writes a buffer to a file at the specified path.
 */
export async function writeBufferToFile(filePath: string, data: Uint8Array): Promise<void> {
    await fs.writeFile(filePath, data);
}

/**
 * Reads the entire contents of a file into a buffer.
 */
export async function readBufferFromFile(filePath: string): Promise<Buffer> {
    return await fs.readFile(filePath);
}

/**
 * Checks if a file or directory exists at the given file path.
 *
 * @param {string} filePath - The path to the file or directory.
 * @return {Promise<boolean>} True if the path exists, false if it does not.
 */
export async function filePathExists(filePath: string): Promise<boolean> {
    try {
        await fs.stat(filePath);
        return true;
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            return false;
        }
        throw error; // Re-throw if it's a different error
    }
}

/**
 * Narrows an unknown thrown value to a Node.js system error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/**
 * Checks whether the filename carries one of the given extensions, ignoring case.
 */
export function hasSupportedExtension(filename: string, extensions: readonly string[]): boolean {
    return extensions.includes(path.extname(filename).toLowerCase());
}

/**
 * Recursively lists files below `dirPath`, sorted, skipping the directories in `exclude`.
 *
 * @param {string} dirPath - The directory to walk.
 * @param {string[]} exclude - Absolute directory paths that are not descended into.
 * @return {Promise<string[]>} Absolute file paths.
 */
export async function walkDirectory(dirPath: string, exclude: string[] = []): Promise<string[]> {
    const excluded = new Set(exclude.map((dir) => path.resolve(dir)));
    const files: string[] = [];

    const visit = async (current: string): Promise<void> => {
        const entries = await fs.readdir(current, { withFileTypes: true });
        for (const entry of entries) {
            const entryPath = path.join(current, entry.name);
            if (entry.isDirectory()) {
                if (!excluded.has(path.resolve(entryPath))) {
                    await visit(entryPath);
                }
            } else if (entry.isFile()) {
                files.push(path.resolve(entryPath));
            }
        }
    };

    await visit(dirPath);
    return files.sort();
}
