// src/config/index.ts

const SCREENSHOT_DPI = 144;

export const PNG_SIGNATURE = Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export const config = {
    imageCompression: {
        compressionLevel: 7, // passed to the PNG encoder
        adaptiveFiltering: true,
    },
    png: {
        idatChunkSize: 65536,
    },
    screenshot: {
        dpi: SCREENSHOT_DPI,
        pixelsPerMeter: Math.round(SCREENSHOT_DPI / 0.0254), // 5669
        description: 'Screenshot',
        orientation: 1, // Horizontal (normal)
        resolutionUnit: 2, // inches
        srgbRenderingIntent: 0, // perceptual
        significantBits: 8,
    },
    metadata: {
        exiftoolPath: 'exiftool',
        fillCaptureDate: true,
    },
    batch: {
        concurrency: 4,
        defaultOutputFolder: 'ios_output',
        singleFileSuffix: '_ios',
    },
    supportedExtensions: ['.png', '.jpg', '.jpeg'],
    verifyOutput: true,
};
