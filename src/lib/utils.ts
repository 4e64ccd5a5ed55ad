import loglevel from 'loglevel';
import color from 'ansi-colors';

export function debugLog(...args: unknown[]) {
  loglevel.debug(color.magenta('[DEBUG]:'), ...args);
}

export function warnLog(...args: unknown[]) {
  loglevel.warn(color.yellow('[WARN]:'), ...args);
}

export function errorLog(...args: unknown[]) {
  loglevel.error(color.red('[ERROR]:'), ...args);
}

export function infoLog(...args: unknown[]) {
  loglevel.info(color.blueBright('[INFO]:'), ...args);
}


/**
 * Hex preview of a command or row for debug output, e.g. `1b 69 7a c0 ...`.
 */
export function formatBytes(data: Uint8Array, limit = 16) {
  const shown = Buffer.from(
    data.buffer,
    data.byteOffset,
    Math.min(limit, data.byteLength)
  );
  const preview = [...shown]
    .map((byte) => byte.toString(16).padStart(2, '0'))
    .join(' ');

  return data.byteLength > limit
    ? `${preview} ... (${data.byteLength} bytes)`
    : preview;
}
