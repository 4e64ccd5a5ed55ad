import assert from 'node:assert/strict';

function literalChunk(row: Uint8Array, start: number, end: number) {
  const chunk = Buffer.alloc(1 + end - start);
  chunk.writeInt8(end - start - 1, 0);
  chunk.set(row.subarray(start, end), 1);

  return chunk;
}

/**
 * Compress a stripe with the TIFF (PackBits) scheme accepted after `M 02`.
 * Runs are encoded as `-count, byte` where `count` is the number of repeats
 * after the first byte; everything else is sent as literal spans of
 * `length - 1, ...bytes`.
 *
 * The row is expected to be no longer than a stripe, so every span fits in a
 * signed byte.
 */
export function* compressTiff(row: Uint8Array): Generator<Buffer> {
  let pos = 0;
  let literalStart = 0;

  while (pos < row.length) {
    let count = 0;
    while (pos + count + 1 < row.length && row[pos + count + 1] === row[pos]) {
      count++;
    }

    if (count > 0) {
      if (literalStart < pos) {
        yield literalChunk(row, literalStart, pos);
      }

      const run = Buffer.alloc(2);
      run.writeInt8(-count, 0);
      run.writeUInt8(row[pos], 1);
      yield run;

      pos += count + 1;
      literalStart = pos;
    } else {
      pos++;
    }
  }

  if (literalStart < pos) {
    yield literalChunk(row, literalStart, pos);
  }
}

/**
 * Expand TIFF-compressed row data the way the printer does.
 */
export function decompressTiff(data: Uint8Array) {
  const input = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  const output: number[] = [];
  let pos = 0;

  while (pos < input.length) {
    const header = input.readInt8(pos);
    pos++;

    if (header >= 0) {
      const end = pos + header + 1;
      assert(end <= input.length, 'Truncated literal span');
      output.push(...input.subarray(pos, end));
      pos = end;
    } else if (header !== -128) {
      assert(pos < input.length, 'Truncated run');
      const value = input[pos];
      for (let i = 0; i < 1 - header; i++) {
        output.push(value);
      }
      pos++;
    }
  }

  return Buffer.from(output);
}
