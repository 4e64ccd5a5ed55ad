import assert from 'node:assert/strict';
import sharp from 'sharp';

import type { ImageSource, Sample } from './raster.js';
import { debugLog } from './utils.js';

export class RasterImage implements ImageSource {
  readonly width: number;
  readonly height: number;
  private data: Buffer;
  private channels: number;
  constructor(data: Buffer, width: number, height: number, channels: number) {
    assert(
      data.length >= width * height * channels,
      `Pixel buffer too small for ${width}x${height}x${channels}`
    );
    this.data = data;
    this.width = width;
    this.height = height;
    this.channels = channels;
  }
  getSample = (x: number, y: number): Sample => {
    assert(
      x >= 0 && x < this.width && y >= 0 && y < this.height,
      `Pixel (${x}, ${y}) outside ${this.width}x${this.height} image`
    );

    const index = (y * this.width + x) * this.channels;

    if (this.channels < 3) {
      return { kind: 'gray', value: this.data[index] };
    }

    return {
      kind: 'rgb',
      channels: [
        this.data[index],
        this.data[index + 1],
        this.data[index + 2],
      ],
    };
  };
}

/**
 * Decode an image with sharp. Transparent areas are flattened onto white so
 * they stay unprinted.
 */
export async function loadImage(input: string | Buffer | sharp.Sharp) {
  const sharpImage = typeof input === 'string' || Buffer.isBuffer(input)
    ? sharp(input)
    : input;

  const { data, info } = await sharpImage
    .flatten({ background: '#ffffff' })
    .raw()
    .toBuffer({ resolveWithObject: true });

  debugLog('Image info:', info);

  return new RasterImage(data, info.width, info.height, info.channels);
}
