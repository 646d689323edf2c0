#!/usr/bin/env node
// src/cli/index.ts

import type { IProgressBar } from '../@types/index.js';

import { Command, InvalidArgumentError } from 'commander';
import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import figlet from 'figlet';
import gradient from 'gradient-string';
import inquirer from 'inquirer';
import cliProgress from 'cli-progress';
import { config } from '../config/index.js';
import { collectImageFiles, convertBatch } from '../core/batch/index.js';
import { defaultSingleOutputFile, planOutputFiles } from '../core/batch/naming.js';
import { convert } from '../core/converter/index.js';
import { describeError } from '../core/errors.js';
import { ExifToolMetadataTool } from '../core/metadata/exifTool.js';
import { ConverterStates } from '../stateMachine/definedStates.js';
import { filePathExists } from '../utils/storage/storageUtils.js';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils.js';

interface ICliOptions {
    concurrency?: number;
    exiftool?: string;
    captureDate: boolean;
    verify: boolean;
    report?: string;
    yes?: boolean;
    log?: boolean;
    verbose?: boolean;
}

function parsePositiveInteger(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

function createProgressBar(format: string): cliProgress.SingleBar {
    return new cliProgress.SingleBar({
        format,
        barCompleteChar: '█',
        barIncompleteChar: '░',
        hideCursor: true,
    }, cliProgress.Presets.shades_grey);
}

/**
 * Asks before replacing outputs from an earlier run. Skipped with `--yes` or when
 * stdin is not a terminal.
 */
async function confirmOverwrite(existing: string[], assumeYes: boolean): Promise<boolean> {
    if (existing.length === 0 || assumeYes || !process.stdin.isTTY) {
        return true;
    }
    const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
        {
            type: 'confirm',
            name: 'overwrite',
            message: `${existing.length} output file(s) already exist (first: ${path.basename(existing[0])}). Overwrite?`,
            default: false,
        },
    ]);
    return overwrite;
}

async function findExisting(outputFiles: string[]): Promise<string[]> {
    const exists = await Promise.all(outputFiles.map((file) => filePathExists(file)));
    return outputFiles.filter((_, index) => exists[index]);
}

const program = new Command();
program
    .name('android2ios')
    .description('Convert Android screenshots into PNG files that iOS recognises as screenshots')
    .version('1.0.0')
    .argument('<input>', 'Screenshot file, or a directory to convert recursively')
    .argument('[output]', 'Output file (single input) or output folder (directory input)')
    .option('-c, --concurrency <number>', `Files converted in parallel (Default: ${config.batch.concurrency})`, parsePositiveInteger)
    .option('--exiftool <path>', `Path of the exiftool executable (Default: ${config.metadata.exiftoolPath})`)
    .option('--no-capture-date', 'Do not create missing capture dates from the file modification time')
    .option('--no-verify', 'Skip the chunk order verification of each output')
    .option('--report <file>', 'Write a JSON report of the batch run')
    .option('-y, --yes', 'Overwrite existing output files without asking')
    .option('-l, --log', 'Enable logging')
    .option('-v, --verbose', 'Enable verbose logging')
    .showHelpAfterError()
    .action(async (input: string, output: string | undefined, options: ICliOptions) => {
        const verbose = options.verbose ?? false;
        const isLogging = options.log ?? false;
        const inputPath = path.resolve(input);

        if (options.exiftool) {
            config.metadata.exiftoolPath = options.exiftool;
        }
        if (options.concurrency !== undefined) {
            config.batch.concurrency = options.concurrency;
        }
        config.metadata.fillCaptureDate = options.captureDate;
        config.verifyOutput = options.verify;

        const logger = getLogger('android2ios', isLogging ? console : NoopLogFacility, verbose);
        const metadataTool = new ExifToolMetadataTool(config.metadata.exiftoolPath, undefined, logger);

        let isDirectory: boolean;
        try {
            isDirectory = (await fs.stat(inputPath)).isDirectory();
        } catch {
            console.error(`"${input}" does not exist or is not a valid file or directory.`);
            process.exit(1);
        }

        if (!isDirectory) {
            const outputFile = output ? path.resolve(output) : defaultSingleOutputFile(inputPath);
            if (!(await confirmOverwrite(await findExisting([outputFile]), options.yes ?? false))) {
                console.error('Aborted.');
                process.exit(1);
            }
            let progressBar: IProgressBar | undefined;
            if (!isLogging) {
                progressBar = createProgressBar('Converting |{bar}| {percentage}% || state: {state}');
                // One tick per pipeline state, one for completion, one for COMPLETED; ERROR is never ticked.
                const steps = Object.keys(ConverterStates).length - (config.verifyOutput ? 0 : 1);
                progressBar.start(steps, 0);
            }
            try {
                const result = await convert({ inputFile: inputPath, outputFile, metadataTool, logger, verbose, progressBar });
                progressBar?.stop();
                for (const warning of result.warnings) {
                    console.warn(`Warning: ${warning}`);
                }
                console.log(`Converted: ${result.outputFile}`);
                process.exit(0);
            } catch (error) {
                progressBar?.stop();
                console.error(`Conversion failed: ${describeError(error)}`);
                process.exit(1);
            }
        }

        const outputFolder = output
            ? path.resolve(output)
            : path.join(inputPath, config.batch.defaultOutputFolder);
        const inputFiles = await collectImageFiles(inputPath, [outputFolder]);
        if (inputFiles.length === 0) {
            console.warn(`No PNG or JPEG files found in "${inputPath}".`);
            process.exit(0);
        }
        const plan = planOutputFiles(inputFiles, outputFolder);
        const existing = await findExisting(plan.map((entry) => entry.outputFile));
        if (!(await confirmOverwrite(existing, options.yes ?? false))) {
            console.error('Aborted.');
            process.exit(1);
        }

        let progressBar: cliProgress.SingleBar | undefined;
        if (!isLogging) {
            progressBar = createProgressBar('Processing |{bar}| {percentage}% || {value}/{total} Files || {file}');
            progressBar.start(inputFiles.length, 0, { file: '' });
        }
        const report = await convertBatch({
            inputFiles,
            outputFolder,
            metadataTool,
            logger,
            verbose,
            progressBar,
            reportFile: options.report ? path.resolve(options.report) : undefined,
        });
        progressBar?.stop();

        for (const entry of report.entries) {
            if (entry.status === 'failed') {
                console.error(`Failed: ${path.relative(inputPath, entry.file)} [${entry.errorKind ?? 'unknown'}] ${entry.reason}`);
            }
            for (const warning of entry.warnings) {
                console.warn(`Warning: ${path.relative(inputPath, entry.file)}: ${warning}`);
            }
        }
        console.log(`Done. Succeeded: ${report.succeeded}, failed: ${report.failed}`);
        console.log(`Output folder: ${outputFolder}`);
        process.exit(report.failed > 0 ? 1 : 0);
    });

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
    console.log(gradient.rainbow.multiline(
        figlet.textSync('android2ios', {
            horizontalLayout: 'default',
            verticalLayout: 'default',
            width: 80,
            whitespaceBreak: true,
        }),
    ));
    console.log(gradient.rainbow('Turns Android screenshots into screenshots iOS recognises.\n'));
    await program.parseAsync(process.argv);
}
