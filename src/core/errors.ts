// src/core/errors.ts

export type ConversionErrorKind = 'decode' | 'assembly' | 'metadata' | 'timestamp' | 'output';

/**
 * Base class of every per-file failure raised by the conversion pipeline.
 * `kind` lets callers tell bad input apart from environment or tool problems.
 */
export abstract class ConversionError extends Error {
    abstract readonly kind: ConversionErrorKind;

    constructor(
        message: string,
        readonly filePath?: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Input is unreadable or not a supported image. */
export class DecodeError extends ConversionError {
    readonly kind = 'decode';
}

/** The raster handed to the assembler violates an internal invariant. */
export class AssemblyError extends ConversionError {
    readonly kind = 'assembly';
}

/**
 * The external metadata tool is missing or rejected the write.
 * The base PNG is already on disk when this is raised.
 */
export class MetadataWriteError extends ConversionError {
    readonly kind = 'metadata';
}

/** Filesystem refused to set the output's times. Reported as a warning. */
export class TimestampError extends ConversionError {
    readonly kind = 'timestamp';
}

export class OutputWriteError extends ConversionError {
    readonly kind = 'output';
}

/**
 * Returns a readable message for anything caught at a pipeline boundary.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
