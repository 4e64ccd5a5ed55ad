import type { ImageSource, Sample } from '../src/lib/raster.js';

export function solidImage(
  width: number,
  height: number,
  value: number
): ImageSource {
  return {
    width,
    height,
    getSample: () => ({ kind: 'gray', value }),
  };
}

export function imageFrom(
  width: number,
  height: number,
  sample: (x: number, y: number) => Sample
): ImageSource {
  return { width, height, getSample: sample };
}

export const hex = (value: string) => Buffer.from(value.replace(/\s+/g, ''), 'hex');
