import type { PixelFormat, RawFrame } from '../types.js';

export type FrameDropReason =
  | 'invalid-dimensions'
  | 'odd-width'
  | 'short-buffer'
  | 'invalid-stride';

export type NormalizeResult =
  | { ok: true; pixels: Buffer; strideBytes: number; padded: boolean }
  | { ok: false; reason: FrameDropReason; message: string };

export function bytesPerPixel(format: PixelFormat): number {
  return format === 'uyvy' ? 2 : 4;
}

function clampByte(value: number): number {
  if (value < 0) {
    return 0;
  }
  if (value > 255) {
    return 255;
  }
  return value;
}

/**
 * Packed 4:2:2 `U Y0 V Y1` to RGBA using the BT.601 integer coefficients
 * (studio swing). Each 4-byte group yields two pixels.
 */
export function uyvyToRgba(
  source: Buffer,
  width: number,
  height: number,
  strideBytes = width * 2
): Buffer {
  const output = Buffer.allocUnsafe(width * height * 4);
  let out = 0;

  for (let y = 0; y < height; y += 1) {
    let offset = y * strideBytes;
    for (let x = 0; x < width; x += 2) {
      const d = source[offset] - 128;
      const c0 = source[offset + 1] - 16;
      const e = source[offset + 2] - 128;
      const c1 = source[offset + 3] - 16;
      offset += 4;

      const rTerm = 409 * e + 128;
      const gTerm = -100 * d - 208 * e + 128;
      const bTerm = 516 * d + 128;

      const y0 = 298 * c0;
      output[out] = clampByte((y0 + rTerm) >> 8);
      output[out + 1] = clampByte((y0 + gTerm) >> 8);
      output[out + 2] = clampByte((y0 + bTerm) >> 8);
      output[out + 3] = 255;

      const y1 = 298 * c1;
      output[out + 4] = clampByte((y1 + rTerm) >> 8);
      output[out + 5] = clampByte((y1 + gTerm) >> 8);
      output[out + 6] = clampByte((y1 + bTerm) >> 8);
      output[out + 7] = 255;
      out += 8;
    }
  }

  return output;
}

/** BGRA/BGRX to RGBA; with `opaque` the fourth byte is forced to 255. */
export function bgraToRgba(
  source: Buffer,
  width: number,
  height: number,
  strideBytes = width * 4,
  opaque = false
): Buffer {
  const output = Buffer.allocUnsafe(width * height * 4);
  let out = 0;

  for (let y = 0; y < height; y += 1) {
    let offset = y * strideBytes;
    for (let x = 0; x < width; x += 1) {
      output[out] = source[offset + 2];
      output[out + 1] = source[offset + 1];
      output[out + 2] = source[offset];
      output[out + 3] = opaque ? 255 : source[offset + 3];
      offset += 4;
      out += 4;
    }
  }

  return output;
}

/** Removes per-row padding from an already RGBA-ordered buffer. */
export function copyRgba(
  source: Buffer,
  width: number,
  height: number,
  strideBytes = width * 4,
  opaque = false
): Buffer {
  const rowBytes = width * 4;
  const output = Buffer.allocUnsafe(rowBytes * height);

  for (let y = 0; y < height; y += 1) {
    source.copy(output, y * rowBytes, y * strideBytes, y * strideBytes + rowBytes);
  }

  if (opaque) {
    for (let index = 3; index < output.length; index += 4) {
      output[index] = 255;
    }
  }

  return output;
}

export function normalizeFrame(frame: RawFrame): NormalizeResult {
  const { width, height, format, data } = frame;

  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    return {
      ok: false,
      reason: 'invalid-dimensions',
      message: `Invalid frame dimensions ${width}x${height}`
    };
  }

  if (format === 'uyvy' && width % 2 !== 0) {
    return { ok: false, reason: 'odd-width', message: `UYVY frame width ${width} is not even` };
  }

  const rowBytes = width * bytesPerPixel(format);
  const expected = rowBytes * height;

  if (data.length < expected) {
    return {
      ok: false,
      reason: 'short-buffer',
      message: `Frame buffer holds ${data.length} bytes, expected ${expected}`
    };
  }

  const strideBytes =
    frame.lineStrideBytes ?? (data.length > expected ? Math.floor(data.length / height) : rowBytes);

  if (strideBytes < rowBytes) {
    return {
      ok: false,
      reason: 'invalid-stride',
      message: `Line stride ${strideBytes} is smaller than row size ${rowBytes}`
    };
  }

  if (strideBytes * (height - 1) + rowBytes > data.length) {
    return {
      ok: false,
      reason: 'short-buffer',
      message: `Frame buffer holds ${data.length} bytes, stride ${strideBytes} needs ${strideBytes * (height - 1) + rowBytes}`
    };
  }

  const padded = strideBytes !== rowBytes;
  let pixels: Buffer;
  switch (format) {
    case 'uyvy':
      pixels = uyvyToRgba(data, width, height, strideBytes);
      break;
    case 'bgra':
      pixels = bgraToRgba(data, width, height, strideBytes, false);
      break;
    case 'bgrx':
      pixels = bgraToRgba(data, width, height, strideBytes, true);
      break;
    case 'rgba':
      pixels = copyRgba(data, width, height, strideBytes, false);
      break;
    case 'rgbx':
      pixels = copyRgba(data, width, height, strideBytes, true);
      break;
  }

  return { ok: true, pixels, strideBytes, padded };
}
