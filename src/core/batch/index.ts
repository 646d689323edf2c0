// src/core/batch/index.ts

import type { IBatchOptions, IBatchReport, IFileReport, IPlannedOutput } from '../../@types/index.js';

import fs from 'node:fs/promises';
import path from 'node:path';
import pLimit from 'p-limit';
import { config } from '../../config/index.js';
import { ensureOutputDirectory, hasSupportedExtension, walkDirectory } from '../../utils/storage/storageUtils.js';
import { convert } from '../converter/index.js';
import { ConversionError, describeError } from '../errors.js';
import { planOutputFiles } from './naming.js';

/**
 * Recursively collects the supported images below a directory, sorted by path.
 *
 * @param {string} inputFolder - Directory to scan.
 * @param {string[]} [exclude] - Directories to skip, typically the output folder.
 * @return {Promise<string[]>} Absolute paths of PNG and JPEG files.
 */
export async function collectImageFiles(inputFolder: string, exclude: string[] = []): Promise<string[]> {
    const files = await walkDirectory(inputFolder, exclude);
    return files.filter((file) => hasSupportedExtension(file, config.supportedExtensions));
}

/**
 * Writes a report to a specified file path in JSON format.
 */
async function writeReport(reportFile: string, report: IBatchReport): Promise<void> {
    await ensureOutputDirectory(path.dirname(reportFile));
    await fs.writeFile(reportFile, JSON.stringify(report, null, 2));
}

/**
 * Converts a list of files into one output folder. Each file runs its own pipeline;
 * a failing file is recorded in the report and never stops its siblings.
 *
 * @param {IBatchOptions} options - Inputs, destination and shared collaborators.
 * @return {Promise<IBatchReport>} Per-file outcome plus success and failure counts.
 */
export async function convertBatch(options: IBatchOptions): Promise<IBatchReport> {
    const {
        inputFiles,
        outputFolder,
        logger,
        progressBar,
        reportFile,
        concurrency = config.batch.concurrency,
    } = options;

    await ensureOutputDirectory(outputFolder);
    const plan = planOutputFiles(inputFiles, outputFolder);
    logger.info(`Converting ${plan.length} file(s) into "${outputFolder}" with ${concurrency} worker(s).`);

    const convertOne = async ({ inputFile, outputFile }: IPlannedOutput): Promise<IFileReport> => {
        const entry: IFileReport = { file: inputFile, output: outputFile, status: 'success', warnings: [] };
        try {
            const result = await convert({
                inputFile,
                outputFile,
                metadataTool: options.metadataTool,
                logger,
                verbose: options.verbose,
                fileTimes: options.fileTimes,
                fillCaptureDate: options.fillCaptureDate,
                verify: options.verify,
            });
            entry.warnings = result.warnings;
            logger.success(`${path.basename(inputFile)} -> ${path.basename(outputFile)}`);
        } catch (error) {
            entry.status = 'failed';
            entry.reason = describeError(error);
            if (error instanceof ConversionError) {
                entry.errorKind = error.kind;
            }
            logger.error(`${path.basename(inputFile)} failed: ${entry.reason}`);
        }
        progressBar?.increment({ file: path.basename(inputFile) });
        return entry;
    };

    const limit = pLimit(Math.max(1, concurrency));
    const entries = await Promise.all(plan.map((entry) => limit(() => convertOne(entry))));
    const succeeded = entries.filter((entry) => entry.status === 'success').length;
    const report: IBatchReport = { outputFolder, succeeded, failed: entries.length - succeeded, entries };

    if (reportFile) {
        await writeReport(reportFile, report);
        logger.debug(`Report written to "${reportFile}".`);
    }
    return report;
}
