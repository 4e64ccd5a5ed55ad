import { describe, expect, it } from 'vitest';

import {
  INK_THRESHOLD,
  luminance,
  rasterizeRow,
} from '../src/lib/raster.js';
import { imageFrom, solidImage } from './fixtures.js';

const STRIPE_BYTES = 51;

describe('luminance', () => {
  it('uses the gray value as is', () => {
    expect(luminance({ kind: 'gray', value: 17 })).toBe(17);
  });

  it('averages the color channels', () => {
    expect(luminance({ kind: 'rgb', channels: [30, 60, 90] })).toBe(60);
  });
});

describe('rasterizeRow', () => {
  it('always returns a full stripe', () => {
    expect(rasterizeRow(solidImage(3, 3, 0), 1, STRIPE_BYTES, 0)).toHaveLength(
      STRIPE_BYTES
    );
  });

  it('leaves a white image unprinted at any offset', () => {
    const image = solidImage(4, 500, 255);

    for (const offset of [-200, -1, 0, 7, 398, 408]) {
      expect(rasterizeRow(image, 2, STRIPE_BYTES, offset)).toEqual(
        Buffer.alloc(STRIPE_BYTES)
      );
    }
  });

  it('prints only the rows inside the image', () => {
    const row = rasterizeRow(solidImage(1, 10, 0), 0, STRIPE_BYTES, 0);

    expect(row[0]).toBe(0xff);
    expect(row[1]).toBe(0xc0);
    expect(row.subarray(2)).toEqual(Buffer.alloc(STRIPE_BYTES - 2));
  });

  it('bottom-aligns a short image with its offset', () => {
    const row = rasterizeRow(solidImage(1, 1, 0), 0, STRIPE_BYTES, 407);

    expect(row.subarray(0, 50)).toEqual(Buffer.alloc(50));
    expect(row[50]).toBe(0x01);
  });

  it('clips a tall image with a negative offset', () => {
    // Only image row 92 is dark; it lands on the first dot
    const image = imageFrom(1, 500, (_x, y) => ({
      kind: 'gray',
      value: y === 92 ? 0 : 255,
    }));
    const row = rasterizeRow(image, 0, STRIPE_BYTES, 408 - 500);

    expect(row[0]).toBe(0x80);
    expect(row.subarray(1)).toEqual(Buffer.alloc(STRIPE_BYTES - 1));
  });

  it('samples the requested column', () => {
    const image = imageFrom(2, 8, (x) => ({ kind: 'gray', value: x * 255 }));

    expect(rasterizeRow(image, 0, 1, 0)).toEqual(Buffer.from([0xff]));
    expect(rasterizeRow(image, 1, 1, 0)).toEqual(Buffer.from([0x00]));
  });

  it('treats columns outside the image as blank', () => {
    const image = solidImage(2, 8, 0);

    expect(rasterizeRow(image, 2, 1, 0)).toEqual(Buffer.from([0x00]));
    expect(rasterizeRow(image, -1, 1, 0)).toEqual(Buffer.from([0x00]));
  });

  it('prints at the threshold and not above it', () => {
    const image = imageFrom(1, 8, (_x, y) =>
      y < 4
        ? { kind: 'rgb', channels: [INK_THRESHOLD, INK_THRESHOLD, INK_THRESHOLD] }
        : { kind: 'rgb', channels: [INK_THRESHOLD, INK_THRESHOLD, INK_THRESHOLD + 1] }
    );

    expect(rasterizeRow(image, 0, 1, 0)).toEqual(Buffer.from([0xf0]));
  });

  it('propagates pixel read failures', () => {
    const image = imageFrom(1, 1, () => {
      throw new Error('read failed');
    });

    expect(() => rasterizeRow(image, 0, 1, 0)).toThrowError('read failed');
  });
});
