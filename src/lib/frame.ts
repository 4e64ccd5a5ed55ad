import assert from 'node:assert/strict';

import { compressTiff } from './compress.js';

export const ROW_MARKER = 0x47; // 'G'
const HEADER_LENGTH = 3;

export enum CompressionMode {
  SIMPLE = 0x00,
  TIFF = 0x02,
}

export class RowFrame {
  payload: Buffer;
  constructor(payload: Buffer) {
    assert(payload.length <= 0xffff, 'Row payload too long');
    this.payload = payload;
  }
  get byteLength() {
    return HEADER_LENGTH + this.payload.length;
  }
  static fromBytes = (bytes: Uint8Array) => {
    const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

    assert(buffer.length >= HEADER_LENGTH, 'Truncated row header');
    assert(buffer[0] === ROW_MARKER, 'Invalid row marker');

    const length = buffer.readUInt16LE(1);
    assert(
      buffer.length >= HEADER_LENGTH + length,
      `Row declares ${length} bytes but only ${buffer.length - HEADER_LENGTH} remain`
    );

    return new RowFrame(
      buffer.subarray(HEADER_LENGTH, HEADER_LENGTH + length)
    );
  };
  static encode = (row: Buffer, mode: CompressionMode) => {
    if (mode === CompressionMode.TIFF) {
      return new RowFrame(Buffer.concat([...compressTiff(row)]));
    }

    return new RowFrame(row);
  };
  toBytes = () => {
    const header = Buffer.alloc(HEADER_LENGTH);
    header.writeUInt8(ROW_MARKER, 0);
    header.writeUInt16LE(this.payload.length, 1);

    return Buffer.concat([header, this.payload]);
  };
}

/**
 * A blank stripe, used for margins. Margins are sent as empty rows rather
 * than with `ESC i d` since not every printer honours that command.
 */
export function emptyRow(stripeBytes: number, mode: CompressionMode) {
  const frame = RowFrame.encode(Buffer.alloc(stripeBytes), mode);

  if (mode === CompressionMode.TIFF) {
    const expected = Buffer.alloc(2);
    expected.writeInt8(1 - stripeBytes, 0);
    assert.deepEqual(frame.payload, expected, 'Unexpected blank row encoding');
  }

  return frame;
}
