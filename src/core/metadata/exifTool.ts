// src/core/metadata/exifTool.ts

import type { ILogger, IMetadataTool, ISetTagsOptions, MetadataTagSet } from '../../@types/index.js';

import { execFile } from 'node:child_process';
import path from 'node:path';
import { promisify } from 'node:util';
import { config } from '../../config/index.js';
import { describeError, MetadataWriteError } from '../errors.js';
import { isErrnoException } from '../../utils/storage/storageUtils.js';

export interface ICommandOutput {
    stdout: string;
    stderr: string;
}

export type CommandRunner = (file: string, args: string[]) => Promise<ICommandOutput>;

const execFileAsync = promisify(execFile);

export const runCommand: CommandRunner = async (file, args) => {
    const { stdout, stderr } = await execFileAsync(file, args, { encoding: 'utf8', maxBuffer: 16 * 1024 * 1024 });
    return { stdout, stderr };
};

const PARTIAL_OUTPUT_NOTE = 'The output file holds the converted image without the merged metadata.';

/**
 * Turns a tag set into exiftool assignments. Numeric values are written with `#=`
 * so exiftool stores the raw value instead of parsing a printed form.
 */
export function buildTagArguments(tags: MetadataTagSet): string[] {
    return Object.entries(tags).map(([name, value]) => {
        if (typeof value === 'object') {
            return `-${name}<${value.copyFrom}`;
        }
        return typeof value === 'number' ? `-${name}#=${value}` : `-${name}=${value}`;
    });
}

// exiftool reads any argument starting with "-" as an option.
function fileArgument(filePath: string): string {
    return filePath.startsWith('-') ? `.${path.sep}${filePath}` : filePath;
}

function readStderr(error: unknown): string {
    if (error instanceof Error && 'stderr' in error && typeof error.stderr === 'string') {
        return error.stderr.trim();
    }
    return '';
}

/**
 * Metadata tool backed by the `exiftool` executable. Every call rewrites the target in place.
 */
export class ExifToolMetadataTool implements IMetadataTool {
    constructor(
        readonly executable: string = config.metadata.exiftoolPath,
        private readonly run: CommandRunner = runCommand,
        private readonly logger?: ILogger,
    ) {}

    /**
     * Copies every writable tag of the source onto the target. A source without tags
     * leaves the target unchanged.
     */
    public async copyAllTags(sourcePath: string, targetPath: string): Promise<void> {
        await this.execute(targetPath, [
            '-overwrite_original',
            '-tagsFromFile',
            fileArgument(sourcePath),
            '-all:all',
            '-unsafe',
            fileArgument(targetPath),
        ]);
    }

    /**
     * Writes the given tags onto the target, replacing existing values unless
     * `createOnly` is set, in which case tags the target already has are left alone.
     */
    public async setTags(targetPath: string, tags: MetadataTagSet, options: ISetTagsOptions = {}): Promise<void> {
        const assignments = buildTagArguments(tags);
        if (assignments.length === 0) {
            return;
        }
        const args = ['-overwrite_original'];
        if (options.createOnly) {
            args.push('-wm', 'cg');
        }
        await this.execute(targetPath, [...args, ...assignments, fileArgument(targetPath)]);
    }

    private async execute(targetPath: string, args: string[]): Promise<void> {
        this.logger?.debug(`Running ${this.executable} ${args.join(' ')}`);
        try {
            const { stderr } = await this.run(this.executable, args);
            if (stderr.trim()) {
                this.logger?.debug(`${this.executable}: ${stderr.trim()}`);
            }
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                throw new MetadataWriteError(
                    `"${this.executable}" was not found, install exiftool or pass its path. ${PARTIAL_OUTPUT_NOTE}`,
                    targetPath,
                    { cause: error },
                );
            }
            const detail = (readStderr(error) || describeError(error)).replace(/\.$/, '');
            throw new MetadataWriteError(
                `${this.executable} rejected "${targetPath}": ${detail}. ${PARTIAL_OUTPUT_NOTE}`,
                targetPath,
                { cause: error },
            );
        }
    }
}
