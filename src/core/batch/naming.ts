// src/core/batch/naming.ts

import type { IPlannedOutput } from '../../@types/index.js';

import path from 'node:path';
import { config } from '../../config/index.js';

const JPEG_EXTENSIONS = ['.jpg', '.jpeg'];

/**
 * Output file name for a source: PNG sources keep their name and extension,
 * JPEG sources keep the base name with a `.png` extension.
 */
export function outputFileName(inputFile: string): string {
    const fileName = path.basename(inputFile);
    const extension = path.extname(fileName);
    if (JPEG_EXTENSIONS.includes(extension.toLowerCase())) {
        return `${fileName.slice(0, -extension.length)}.png`;
    }
    return fileName;
}

/**
 * Default output path when a single file is converted without an explicit target:
 * `<dir>/<base>_ios.png` next to the source.
 */
export function defaultSingleOutputFile(inputFile: string): string {
    const { dir, name } = path.parse(inputFile);
    return path.join(dir, `${name}${config.batch.singleFileSuffix}.png`);
}

/**
 * Assigns every input a distinct path inside `outputFolder`. The first input claiming
 * a name keeps it; later ones get `_1`, `_2`, ... before the extension. Names are
 * compared case-insensitively so outputs stay distinct on case-insensitive filesystems.
 *
 * @param {string[]} inputFiles - Sources in processing order.
 * @param {string} outputFolder - Destination directory.
 * @return {IPlannedOutput[]} One entry per input, in the same order.
 */
export function planOutputFiles(inputFiles: string[], outputFolder: string): IPlannedOutput[] {
    const taken = new Set<string>();
    const counters = new Map<string, number>();

    return inputFiles.map((inputFile) => {
        const preferred = outputFileName(inputFile);
        const key = preferred.toLowerCase();
        let candidate = preferred;

        if (taken.has(key)) {
            const extension = path.extname(preferred);
            const base = preferred.slice(0, preferred.length - extension.length);
            let counter = counters.get(key) ?? 0;
            do {
                counter += 1;
                candidate = `${base}_${counter}${extension}`;
            } while (taken.has(candidate.toLowerCase()));
            counters.set(key, counter);
        }

        taken.add(candidate.toLowerCase());
        return { inputFile, outputFile: path.join(outputFolder, candidate) };
    });
}
