// src/core/imageProcessing/imageProcessorStrategies.ts

import type { ImageProcessor } from '../../@types/index.js';
import { SharpImageProcessor } from './strategies/SharpImageProcessor.js';

/**
 * Enumeration of supported image processor strategies.
 */
export enum SupportedImageProcessorStrategies {
    Sharp = 'sharp',
}

/**
 * Mapping of image processor identifiers to their corresponding implementations.
 */
export const ImageProcessorStrategyMap: Record<SupportedImageProcessorStrategies, ImageProcessor> = {
    [SupportedImageProcessorStrategies.Sharp]: new SharpImageProcessor(),
};
