export type Sample =
  | { kind: 'gray'; value: number }
  | { kind: 'rgb'; channels: readonly [number, number, number] };

export interface ImageSource {
  readonly width: number;
  readonly height: number;
  getSample(x: number, y: number): Sample;
}

// Anything at or below this luminance gets ink
export const INK_THRESHOLD = 230;

export function luminance(sample: Sample) {
  switch (sample.kind) {
    case 'gray': {
      return sample.value;
    }
    case 'rgb': {
      const [r, g, b] = sample.channels;
      return (r + g + b) / 3;
    }
  }
}

/**
 * Build one stripe from column `x` of the image. Dots are packed eight per
 * byte, most significant bit first; dot `n` shows image row `n - offset`.
 */
export function rasterizeRow(
  image: ImageSource,
  x: number,
  stripeBytes: number,
  offset: number
) {
  const row = Buffer.alloc(stripeBytes);

  if (x < 0 || x >= image.width) return row;

  for (let byteIndex = 0; byteIndex < stripeBytes; byteIndex++) {
    let bits = 0;

    for (let bitIndex = 0; bitIndex < 8; bitIndex++) {
      const y = byteIndex * 8 + bitIndex - offset;
      if (y < 0 || y >= image.height) continue;

      if (luminance(image.getSample(x, y)) <= INK_THRESHOLD) {
        bits |= 1 << (7 - bitIndex);
      }
    }

    row[byteIndex] = bits;
  }

  return row;
}
