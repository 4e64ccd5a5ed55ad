import { CompressionMode, RowFrame, emptyRow } from './frame.js';
import { resolveStripeSize } from './profile.js';
import { rasterizeRow, type ImageSource } from './raster.js';
import { debugLog } from './utils.js';

export const DEFAULT_MARGIN = 8;

const ESC = 0x1b;

export enum Command {
  INITIALIZE = 0x40, // ESC @
  PAGE_FEED = 0x0c,
  PRINT = 0x1a,
  COMPRESSION_MODE = 0x4d, // M
}

// Sub-commands sent after ESC i
export enum ControlCode {
  RASTER_MODE = 0x61, // a
  PRINT_INFORMATION = 0x7a, // z
  VARIOUS_MODE = 0x4d, // M
  MARGIN = 0x64, // d
}

export enum PrintInfoFlag {
  QUALITY = 0x40,
  RECOVER = 0x80,
}

export type RenderOptions = {
  model?: string | null;
  topMargin?: number;
  bottomMargin?: number;
  compression?: CompressionMode;
};

function control(code: ControlCode, ...args: number[]) {
  return Buffer.from([ESC, 0x69, code, ...args]);
}

function printInformation(rasterNumber: number, firstPage: boolean) {
  const data = Buffer.alloc(10);
  data.writeUInt8(PrintInfoFlag.RECOVER | PrintInfoFlag.QUALITY, 0);
  // Media type, width and length are left unspecified
  data.writeUInt8(0, 1);
  data.writeUInt8(0, 2);
  data.writeUInt8(0, 3);
  data.writeUInt32LE(rasterNumber, 4);
  // 0 marks the starting page
  data.writeUInt8(firstPage ? 0 : 1, 8);
  data.writeUInt8(0, 9);

  return Buffer.concat([control(ControlCode.PRINT_INFORMATION), data]);
}

/**
 * Render images into a raster job for Brother PT printers (P950NW, 9800PCN).
 *
 * Each image is printed sideways: every column becomes one stripe, so the
 * image width sets the label length and images shorter than the stripe are
 * aligned to its bottom edge. Margins are sent as blank rows.
 *
 * Nothing is rendered until the returned generator is consumed.
 */
export function* renderJob(
  images: Iterable<ImageSource>,
  {
    model,
    topMargin = DEFAULT_MARGIN,
    bottomMargin = DEFAULT_MARGIN,
    compression = CompressionMode.SIMPLE,
  }: RenderOptions = {}
): Generator<Buffer> {
  const stripeSize = resolveStripeSize(model);
  const stripeBytes = stripeSize / 8;

  debugLog('Stripe geometry:', { model, stripeSize, stripeBytes });

  yield Buffer.from([ESC, Command.INITIALIZE]);
  yield control(ControlCode.RASTER_MODE, 0x01);
  // No auto cut
  yield control(ControlCode.VARIOUS_MODE, 0x00);
  yield control(ControlCode.MARGIN, 0x00, 0x00);

  const margin = emptyRow(stripeBytes, compression).toBytes();
  let first = true;

  for (const image of images) {
    if (!first) {
      yield Buffer.from([Command.PAGE_FEED]);
    }

    // The raster number is the label length, not the stripe height
    const rasterNumber = image.width + topMargin + bottomMargin;
    yield printInformation(rasterNumber, first);
    yield Buffer.from([Command.COMPRESSION_MODE, compression]);

    first = false;

    for (let i = 0; i < topMargin; i++) {
      yield Buffer.from(margin);
    }

    const offset = stripeSize - image.height;
    for (let x = 0; x < image.width; x++) {
      const row = rasterizeRow(image, x, stripeBytes, offset);
      yield RowFrame.encode(row, compression).toBytes();
    }

    // The trailing margin repeats the top margin count; bottomMargin only
    // feeds the raster number.
    for (let i = 0; i < topMargin; i++) {
      yield Buffer.from(margin);
    }
  }

  yield Buffer.from([Command.PRINT]);
}

export function renderToBuffer(
  images: Iterable<ImageSource>,
  options?: RenderOptions
) {
  return Buffer.concat([...renderJob(images, options)]);
}
