// src/core/metadata/mergeEngine.ts

import type { ILogger, IMetadataTool, MetadataTagSet } from '../../@types/index.js';

import { config } from '../../config/index.js';
import { formatExifDate } from '../../utils/misc/dateUtils.js';

/**
 * The tags iOS looks at to classify an image as a screenshot. Always written last,
 * so they win over anything copied from the source.
 */
export function screenshotOverrideTags(): MetadataTagSet {
    const { screenshot } = config;
    return {
        ImageDescription: screenshot.description,
        UserComment: screenshot.description,
        Orientation: screenshot.orientation,
        XResolution: screenshot.dpi,
        YResolution: screenshot.dpi,
        ResolutionUnit: screenshot.resolutionUnit,
    };
}

/**
 * Date tags derived from the source mtime, for sources that carry no capture date.
 */
export function captureDateTags(mtime: Date): MetadataTagSet {
    const value = formatExifDate(mtime);
    return { DateTimeOriginal: value, CreateDate: value, ModifyDate: value };
}

/**
 * CreateDate and ModifyDate copied from the capture date the source already carries.
 */
export function captureDateFromOriginalTags(): MetadataTagSet {
    return {
        CreateDate: { copyFrom: 'DateTimeOriginal' },
        ModifyDate: { copyFrom: 'DateTimeOriginal' },
    };
}

/**
 * Pure model of the merge: source tags first, overrides replace matching keys.
 */
export function mergeTagSets(sourceTags: MetadataTagSet, overrides: MetadataTagSet): MetadataTagSet {
    return { ...sourceTags, ...overrides };
}

export interface IMergeMetadataOptions {
    logger: ILogger;
    /**
     * Source mtime. When given, missing capture dates are created from the source's
     * DateTimeOriginal, or from this date when the source has none.
     */
    captureDate?: Date;
}

/**
 * Writes the merged tag set onto the output: every source tag is copied first, then
 * missing capture dates are created, then the screenshot overrides are applied.
 * A missing CreateDate or ModifyDate takes the source's DateTimeOriginal before it
 * falls back to the mtime.
 *
 * @param {string} sourceFile - The original image.
 * @param {string} outputFile - The assembled PNG already on disk.
 * @param {IMetadataTool} tool - Metadata editor.
 * @param {IMergeMetadataOptions} options - Logger and optional capture date.
 * @throws {MetadataWriteError} If any tool invocation fails; the output then holds the image
 * with incomplete metadata.
 */
export async function mergeMetadata(
    sourceFile: string,
    outputFile: string,
    tool: IMetadataTool,
    options: IMergeMetadataOptions,
): Promise<void> {
    const { logger, captureDate } = options;

    logger.debug(`Copying tags from "${sourceFile}".`);
    await tool.copyAllTags(sourceFile, outputFile);

    if (captureDate) {
        // Tags left unset by the source DateTimeOriginal fall through to the mtime.
        await tool.setTags(outputFile, captureDateFromOriginalTags(), { createOnly: true });
        logger.debug(`Filling remaining capture dates with ${formatExifDate(captureDate)}.`);
        await tool.setTags(outputFile, captureDateTags(captureDate), { createOnly: true });
    }

    await tool.setTags(outputFile, screenshotOverrideTags());
    logger.debug('Screenshot tags applied.');
}
