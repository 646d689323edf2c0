// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import type { IDecodedImage, ImageProcessor, IRasterImage } from '../../../@types/index.js';

import sharp from 'sharp';
import { config } from '../../../config/index.js';

export class SharpImageProcessor implements ImageProcessor {
    /**
     * Decodes a PNG or JPEG into 8-bit interleaved pixels.
     * JPEG input is converted to the sRGB colour space so CMYK sources come out as RGB.
     * PNG input keeps its stored samples: an embedded ICC profile is carried over as a
     * chunk, so the pixels must not be converted out of it. Greyscale with alpha comes
     * out as RGBA and 16-bit samples are reduced to 8 bits.
     *
     * @param {Uint8Array} data - The encoded image.
     * @return {Promise<IDecodedImage>} The raster and the detected source format.
     * @throws {Error} If sharp cannot read the data or the format is neither PNG nor JPEG.
     */
    public async decodeImage(data: Uint8Array): Promise<IDecodedImage> {
        const input = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
        const { format, channels, depth } = await sharp(input).metadata();
        if (format !== 'png' && format !== 'jpeg') {
            throw new Error(`Unsupported image format "${format ?? 'unknown'}"`);
        }

        let image = sharp(input, { failOn: 'error' });
        if (format === 'jpeg') {
            image = image.toColourspace('srgb');
        } else {
            image = image.keepIccProfile();
            // Raw greyscale output keeps only the first band, and 16-bit samples need
            // scaling down rather than a plain cast.
            if (channels === 2 || depth === 'ushort') {
                image = image.toColourspace(channels === 1 ? 'b-w' : 'srgb');
            }
        }
        const { data: pixels, info } = await image.raw().toBuffer({ resolveWithObject: true });
        return {
            format,
            raster: {
                data: new Uint8Array(pixels.buffer, pixels.byteOffset, pixels.byteLength),
                width: info.width,
                height: info.height,
                channels: info.channels,
            },
        };
    }

    /**
     * Encodes raw pixels as a PNG without a palette. Only the IHDR and IDAT chunks of the
     * result are meant to be used; sharp's own ancillary chunks are discarded by the caller.
     *
     * @param {IRasterImage} raster - 8-bit interleaved pixels.
     * @return {Promise<Uint8Array>} The encoded PNG.
     */
    public async encodeImage(raster: IRasterImage): Promise<Uint8Array> {
        const { data, width, height, channels } = raster;
        return await sharp(data, {
            raw: {
                width,
                height,
                channels,
            },
        })
            .png({
                compressionLevel: config.imageCompression.compressionLevel,
                adaptiveFiltering: config.imageCompression.adaptiveFiltering,
                palette: false,
            })
            .toBuffer();
    }
}
