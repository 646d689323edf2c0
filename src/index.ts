// src/index.ts

export * from './@types/index.js';
export { config } from './config/index.js';
export {
    AssemblyError,
    ConversionError,
    type ConversionErrorKind,
    DecodeError,
    describeError,
    MetadataWriteError,
    OutputWriteError,
    TimestampError,
} from './core/errors.js';
export { convert } from './core/converter/index.js';
export { collectImageFiles, convertBatch } from './core/batch/index.js';
export { defaultSingleOutputFile, outputFileName, planOutputFiles } from './core/batch/naming.js';
export { loadSourceImage, normalizeImage, normalizeSourceFile } from './core/normalizer/index.js';
export { assemblePng, type IAssembleOptions } from './core/png/assembler.js';
export { extractAncillaryChunks } from './core/png/ancillary.js';
export { findChunkOrderViolations, restoreChunkOrder } from './core/png/chunkOrder.js';
export { encodePng, listChunkTypes, parseChunks, PngFormatError } from './core/png/chunks.js';
export { ExifToolMetadataTool } from './core/metadata/exifTool.js';
export { captureDateTags, mergeMetadata, mergeTagSets, screenshotOverrideTags } from './core/metadata/mergeEngine.js';
export { NodeFileTimes, preserveTimestamp } from './core/timestamp/fileTimes.js';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils.js';
