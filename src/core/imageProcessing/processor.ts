// src/core/imageProcessing/processor.ts

import type { IDecodedImage, IRasterImage } from '../../@types/index.js';
import { ImageProcessorStrategyMap, SupportedImageProcessorStrategies } from './imageProcessorStrategies.js';

/**
 * Decodes an encoded image using the provided image processing strategy.
 *
 * @param {Uint8Array} data - The encoded PNG or JPEG bytes.
 * @param {SupportedImageProcessorStrategies} processorStrategy - The strategy to be used for decoding.
 * @return {Promise<IDecodedImage>} A promise that resolves to the decoded raster and its source format.
 */
export async function decodeImageData(
    data: Uint8Array,
    processorStrategy: SupportedImageProcessorStrategies = SupportedImageProcessorStrategies.Sharp,
): Promise<IDecodedImage> {
    const processor = ImageProcessorStrategyMap[processorStrategy];
    return await processor.decodeImage(data);
}

/**
 * Encodes raw pixels as a PNG stream using the provided image processing strategy.
 */
export async function encodeImageData(
    raster: IRasterImage,
    processorStrategy: SupportedImageProcessorStrategies = SupportedImageProcessorStrategies.Sharp,
): Promise<Uint8Array> {
    const processor = ImageProcessorStrategyMap[processorStrategy];
    return await processor.encodeImage(raster);
}
