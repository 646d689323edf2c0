// tests/batch.test.ts

import type { IBatchReport, IFileTimes } from '../src/@types/index.js';

import fs from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import sharp from 'sharp';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { collectImageFiles, convertBatch } from '../src/core/batch/index.js';
import { listChunkTypes } from '../src/core/png/chunks.js';
import { FakeMetadataTool } from './helpers/fakeMetadataTool.js';
import { MockLogger } from './helpers/mockLogger.js';
import { buildPng, makeTempDir, patternRaster } from './helpers/pngFixtures.js';

describe('Batch conversion', () => {
    let inputDir: string;
    let outputDir: string;

    beforeAll(async () => {
        inputDir = await makeTempDir('batch');
        outputDir = path.join(inputDir, 'ios_output');
        await fs.mkdir(path.join(inputDir, 'nested'), { recursive: true });
        await fs.mkdir(outputDir, { recursive: true });

        await fs.writeFile(path.join(inputDir, 'a.png'), await buildPng(patternRaster(3, 3, 3)));
        await fs.writeFile(path.join(inputDir, 'broken.png'), 'not an image');
        await fs.writeFile(path.join(inputDir, 'notes.txt'), 'ignored');
        await fs.writeFile(path.join(inputDir, 'nested', 'a.png'), await buildPng(patternRaster(2, 2, 4)));
        await fs.writeFile(
            path.join(inputDir, 'nested', 'photo.JPG'),
            await sharp({ create: { width: 4, height: 4, channels: 3, background: { r: 1, g: 2, b: 3 } } }).jpeg().toBuffer(),
        );
        await fs.writeFile(path.join(outputDir, 'old.png'), await buildPng(patternRaster(1, 1, 1)));
    });

    afterAll(async () => {
        await fs.rm(inputDir, { recursive: true, force: true });
    });

    it('collects supported images recursively and skips the output folder', async () => {
        const files = await collectImageFiles(inputDir, [outputDir]);
        expect(files.map((file) => path.relative(inputDir, file))).toEqual([
            'a.png',
            'broken.png',
            path.join('nested', 'a.png'),
            path.join('nested', 'photo.JPG'),
        ]);
    });

    it('converts every file, records failures and keeps going', async () => {
        const inputFiles = await collectImageFiles(inputDir, [outputDir]);
        const logger = new MockLogger();
        const reportFile = path.join(inputDir, 'reports', 'report.json');
        const increments: unknown[] = [];

        const report = await convertBatch({
            inputFiles,
            outputFolder: outputDir,
            metadataTool: new FakeMetadataTool(),
            logger,
            verbose: false,
            concurrency: 2,
            reportFile,
            progressBar: {
                start: () => {},
                stop: () => {},
                increment: (payload) => {
                    increments.push(payload?.file);
                },
            },
        });

        expect(report.succeeded).toBe(3);
        expect(report.failed).toBe(1);
        expect(report.entries.map((entry) => [path.basename(entry.output), entry.status])).toEqual([
            ['a.png', 'success'],
            ['broken.png', 'failed'],
            ['a_1.png', 'success'],
            ['photo.png', 'success'],
        ]);
        expect(report.entries[1].errorKind).toBe('decode');
        expect(increments).toHaveLength(4);
        expect(logger.successMessages).toHaveLength(3);
        expect(logger.errorMessages.filter((message) => message.startsWith('broken.png failed: '))).toHaveLength(1);

        const written = (await fs.readdir(outputDir)).sort();
        expect(written).toEqual(['a.png', 'a_1.png', 'old.png', 'photo.png']);
        expect(listChunkTypes(await fs.readFile(path.join(outputDir, 'photo.png')))).toEqual(
            ['IHDR', 'sRGB', 'eXIf', 'pHYs', 'sBIT', 'IDAT', 'IEND'],
        );

        const saved: IBatchReport = JSON.parse(await fs.readFile(reportFile, 'utf8'));
        expect(saved.succeeded).toBe(3);
        expect(saved.entries[1].reason).toBe(report.entries[1].reason);
    });

    it('never runs more conversions at once than the concurrency allows', async () => {
        const sourceDir = await makeTempDir('batch-limit');
        const inputFiles: string[] = [];
        for (let i = 0; i < 5; i++) {
            const file = path.join(sourceDir, `shot${i}.png`);
            await fs.writeFile(file, await buildPng(patternRaster(2, 2, 3)));
            inputFiles.push(file);
        }
        let inFlight = 0;
        let peak = 0;
        // A conversion reads the source mtime first and sets the output mtime last.
        const fileTimes: IFileTimes = {
            getModificationTime: async () => {
                inFlight++;
                peak = Math.max(peak, inFlight);
                await sleep(20);
                return new Date('2024-01-01T00:00:00.000Z');
            },
            setModificationTime: async () => {
                inFlight--;
            },
        };

        try {
            const report = await convertBatch({
                inputFiles,
                outputFolder: path.join(sourceDir, 'out'),
                metadataTool: new FakeMetadataTool(),
                logger: new MockLogger(),
                verbose: false,
                fileTimes,
                concurrency: 2,
            });

            expect(report.succeeded).toBe(5);
            expect(peak).toBe(2);
            expect(inFlight).toBe(0);
        } finally {
            await fs.rm(sourceDir, { recursive: true, force: true });
        }
    });

    it('returns an empty report for an empty input list', async () => {
        const report = await convertBatch({
            inputFiles: [],
            outputFolder: path.join(inputDir, 'empty_out'),
            metadataTool: new FakeMetadataTool(),
            logger: new MockLogger(),
            verbose: false,
        });
        expect(report).toEqual({ outputFolder: path.join(inputDir, 'empty_out'), succeeded: 0, failed: 0, entries: [] });
    });
});
