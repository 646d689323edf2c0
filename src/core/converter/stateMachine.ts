// src/core/converter/stateMachine.ts

import type {
    IConversionResult,
    IConvertOptions,
    IFileTimes,
    IRestoredChunkOrder,
    ISourceImage,
} from '../../@types/index.js';

import path from 'node:path';
import { config } from '../../config/index.js';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.js';
import { ConverterStates } from '../../stateMachine/definedStates.js';
import { readBufferFromFile, writeBufferToFile } from '../../utils/storage/storageUtils.js';
import {
    AssemblyError,
    ConversionError,
    describeError,
    MetadataWriteError,
    OutputWriteError,
    TimestampError,
} from '../errors.js';
import { mergeMetadata } from '../metadata/mergeEngine.js';
import { captureSourceTimestamp, normalizeSourceFile } from '../normalizer/index.js';
import { assemblePng } from '../png/assembler.js';
import { findChunkOrderViolations, restoreChunkOrder } from '../png/chunkOrder.js';
import { listChunkTypes } from '../png/chunks.js';
import { defaultFileTimes, preserveTimestamp } from '../timestamp/fileTimes.js';

export class ConvertStateMachine extends AbstractStateMachine<ConverterStates, IConvertOptions> {
    private readonly fileTimes: IFileTimes;
    private sourceMtime: Date | null = null;
    private source: Omit<ISourceImage, 'mtime'> | null = null;
    private pngData: Buffer | null = null;
    private readonly warnings: string[] = [];

    constructor(options: IConvertOptions) {
        super(ConverterStates.INIT, options);
        this.fileTimes = options.fileTimes ?? defaultFileTimes;

        this.stateTransitions = [
            { state: ConverterStates.INIT, handler: this.init },
            { state: ConverterStates.CAPTURE_SOURCE_TIMESTAMP, handler: this.captureSourceTimestamp },
            { state: ConverterStates.NORMALIZE_SOURCE, handler: this.normalizeSource },
            { state: ConverterStates.ASSEMBLE_PNG, handler: this.assemblePng },
            { state: ConverterStates.WRITE_OUTPUT, handler: this.writeOutput },
            { state: ConverterStates.MERGE_METADATA, handler: this.mergeMetadata },
            { state: ConverterStates.RESTORE_CHUNK_ORDER, handler: this.restoreChunkOrder },
        ];
        if (options.verify ?? config.verifyOutput) {
            this.stateTransitions.push({ state: ConverterStates.VERIFY_OUTPUT, handler: this.verifyOutput });
        }
        // Last: every write above would bump the mtime again.
        this.stateTransitions.push({ state: ConverterStates.PRESERVE_TIMESTAMP, handler: this.preserveTimestamp });
    }

    protected getCompletionState(): ConverterStates {
        return ConverterStates.COMPLETED;
    }

    protected getErrorState(): ConverterStates {
        return ConverterStates.ERROR;
    }

    /**
     * Result of a completed run. Warnings hold the non-fatal problems, such as a
     * timestamp that could not be restored.
     */
    getResult(): IConversionResult {
        const { inputFile, outputFile } = this.options;
        return { inputFile, outputFile, warnings: [...this.warnings] };
    }

    /**
     * Refuses to run when the output would replace the source.
     */
    private init(): void {
        const { inputFile, outputFile, logger, verbose } = this.options;
        if (verbose) logger.info(`Converting "${path.basename(inputFile)}"...`);
        if (path.resolve(inputFile) === path.resolve(outputFile)) {
            throw new OutputWriteError(`Output path equals the source path "${inputFile}"`, inputFile);
        }
    }

    private async captureSourceTimestamp(): Promise<void> {
        const { inputFile, logger } = this.options;
        this.sourceMtime = await captureSourceTimestamp(inputFile, this.fileTimes);
        logger.debug(`Source modification time: ${this.sourceMtime.toISOString()}`);
    }

    /**
     * Decodes the source into a raster and the chunks to carry over.
     */
    private async normalizeSource(): Promise<void> {
        const { inputFile, logger } = this.options;
        this.source = await normalizeSourceFile(inputFile, logger);
        const { raster, format } = this.source;
        logger.debug(`Decoded ${format.toUpperCase()} ${raster.width}x${raster.height}, ${raster.channels} channel(s).`);
    }

    private async assemblePng(): Promise<void> {
        const { logger } = this.options;
        const source = this.requireSource();
        let pngData: Buffer;
        try {
            pngData = await assemblePng(source.raster, source.ancillary, { logger });
        } catch (error) {
            if (error instanceof AssemblyError) {
                throw new AssemblyError(error.message, this.options.inputFile, { cause: error });
            }
            throw error;
        }
        this.pngData = pngData;
        logger.debug(`Assembled ${pngData.length} bytes: ${listChunkTypes(pngData).join(', ')}`);
    }

    private async writeOutput(): Promise<void> {
        const { outputFile, logger } = this.options;
        if (!this.pngData) {
            throw new AssemblyError('No PNG data to write', this.options.inputFile);
        }
        try {
            await writeBufferToFile(outputFile, this.pngData);
        } catch (error) {
            throw new OutputWriteError(
                `Cannot write "${outputFile}": ${describeError(error)}`,
                this.options.inputFile,
                { cause: error },
            );
        }
        logger.debug(`Base PNG written to "${outputFile}".`);
    }

    /**
     * Copies the source's tags onto the output and applies the screenshot overrides.
     * On failure the base PNG stays on disk without the merged metadata.
     */
    private async mergeMetadata(): Promise<void> {
        const { inputFile, outputFile, metadataTool, logger } = this.options;
        const fillCaptureDate = this.options.fillCaptureDate ?? config.metadata.fillCaptureDate;
        try {
            await mergeMetadata(inputFile, outputFile, metadataTool, {
                logger,
                captureDate: fillCaptureDate && this.sourceMtime ? this.sourceMtime : undefined,
            });
        } catch (error) {
            if (error instanceof ConversionError) {
                throw error;
            }
            throw new MetadataWriteError(`Metadata merge failed: ${describeError(error)}`, inputFile, { cause: error });
        }
    }

    /**
     * The metadata tool may move the eXIf chunk or add new ones; put them back in place.
     */
    private async restoreChunkOrder(): Promise<void> {
        const { outputFile, logger } = this.options;
        const written = await this.readOutput();
        let restored: IRestoredChunkOrder;
        try {
            restored = restoreChunkOrder(written, logger);
        } catch (error) {
            throw new AssemblyError(
                `Cannot read chunks of "${outputFile}" after the metadata write: ${describeError(error)}`,
                this.options.inputFile,
                { cause: error },
            );
        }
        const { bytes, changed } = restored;
        if (!changed) {
            return;
        }
        try {
            await writeBufferToFile(outputFile, bytes);
        } catch (error) {
            throw new OutputWriteError(
                `Cannot rewrite "${outputFile}": ${describeError(error)}`,
                this.options.inputFile,
                { cause: error },
            );
        }
        logger.debug('Chunk order restored after the metadata write.');
    }

    private async verifyOutput(): Promise<void> {
        const { inputFile, logger } = this.options;
        const written = await this.readOutput();
        let types: string[];
        try {
            types = listChunkTypes(written);
        } catch (error) {
            throw new AssemblyError(`Output is not a readable PNG: ${describeError(error)}`, inputFile, { cause: error });
        }
        const violations = findChunkOrderViolations(types);
        if (violations.length > 0) {
            throw new AssemblyError(`Output chunk order is invalid: ${violations.join('; ')}`, inputFile);
        }
        logger.debug(`Verified chunk order: ${types.join(', ')}`);
    }

    /**
     * A failure here leaves content and metadata intact, so it only produces a warning.
     */
    private async preserveTimestamp(): Promise<void> {
        const { outputFile, logger } = this.options;
        if (!this.sourceMtime) {
            return;
        }
        try {
            await preserveTimestamp(outputFile, this.sourceMtime, this.fileTimes);
        } catch (error) {
            if (!(error instanceof TimestampError)) {
                throw error;
            }
            logger.warn(error.message);
            this.warnings.push(error.message);
        }
    }

    private async readOutput(): Promise<Buffer> {
        const { inputFile, outputFile } = this.options;
        try {
            return await readBufferFromFile(outputFile);
        } catch (error) {
            throw new OutputWriteError(`Cannot read back "${outputFile}": ${describeError(error)}`, inputFile, {
                cause: error,
            });
        }
    }

    private requireSource(): Omit<ISourceImage, 'mtime'> {
        if (!this.source) {
            throw new AssemblyError('Source image was not normalized', this.options.inputFile);
        }
        return this.source;
    }
}
