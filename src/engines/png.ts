import { inflateSync } from 'node:zlib';

/**
 * Decoded raster, one luminance byte per pixel, row-major.
 */
export interface GrayImage {
  width: number;
  height: number;
  luma: Uint8Array;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

// Channels per color type (8-bit depth only)
const CHANNELS: Record<number, number> = {
  0: 1, // grayscale
  2: 3, // RGB
  4: 2, // grayscale + alpha
  6: 4, // RGBA
};

function paeth(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}

/**
 * Undo per-scanline filters in place. Returns the unfiltered rows packed
 * without filter bytes.
 */
function unfilter(data: Buffer, width: number, height: number, bpp: number): Uint8Array {
  const rowBytes = width * bpp;
  const out = new Uint8Array(rowBytes * height);

  for (let row = 0; row < height; row++) {
    const filter = data[row * (rowBytes + 1)];
    const src = row * (rowBytes + 1) + 1;
    const dst = row * rowBytes;
    const prev = dst - rowBytes;

    for (let i = 0; i < rowBytes; i++) {
      const raw = data[src + i];
      const left = i >= bpp ? out[dst + i - bpp] : 0;
      const up = row > 0 ? out[prev + i] : 0;
      const upLeft = row > 0 && i >= bpp ? out[prev + i - bpp] : 0;

      let value: number;
      switch (filter) {
        case 0:
          value = raw;
          break;
        case 1:
          value = raw + left;
          break;
        case 2:
          value = raw + up;
          break;
        case 3:
          value = raw + ((left + up) >> 1);
          break;
        case 4:
          value = raw + paeth(left, up, upLeft);
          break;
        default:
          throw new Error(`Unsupported PNG filter type ${filter}`);
      }
      out[dst + i] = value & 0xff;
    }
  }

  return out;
}

/**
 * Decode an 8-bit, non-interlaced PNG to grayscale luminance. Alpha is
 * composited over white. Returns null for anything it cannot read.
 */
export function decodePNG(buffer: Buffer): GrayImage | null {
  if (buffer.length < 8 || PNG_SIGNATURE.some((b, i) => buffer[i] !== b)) {
    return null;
  }

  try {
    let offset = 8;
    let width = 0;
    let height = 0;
    let bitDepth = 0;
    let colorType = 0;
    let interlace = 0;
    const idatChunks: Buffer[] = [];

    while (offset + 8 <= buffer.length) {
      const length = buffer.readUInt32BE(offset);
      const type = buffer.toString('ascii', offset + 4, offset + 8);

      if (type === 'IHDR') {
        width = buffer.readUInt32BE(offset + 8);
        height = buffer.readUInt32BE(offset + 12);
        bitDepth = buffer[offset + 16];
        colorType = buffer[offset + 17];
        interlace = buffer[offset + 20];
      } else if (type === 'IDAT') {
        idatChunks.push(buffer.subarray(offset + 8, offset + 8 + length));
      } else if (type === 'IEND') {
        break;
      }

      offset += 12 + length; // length(4) + type(4) + data + crc(4)
    }

    const channels = CHANNELS[colorType];
    if (!width || !height || idatChunks.length === 0 || bitDepth !== 8 || !channels || interlace !== 0) {
      return null;
    }

    const pixels = unfilter(inflateSync(Buffer.concat(idatChunks)), width, height, channels);
    const luma = new Uint8Array(width * height);

    for (let i = 0; i < width * height; i++) {
      const p = i * channels;
      let gray: number;
      let alpha = 255;
      if (channels >= 3) {
        gray = 0.299 * pixels[p] + 0.587 * pixels[p + 1] + 0.114 * pixels[p + 2];
        if (channels === 4) alpha = pixels[p + 3];
      } else {
        gray = pixels[p];
        if (channels === 2) alpha = pixels[p + 1];
      }
      luma[i] = Math.round((gray * alpha + 255 * (255 - alpha)) / 255);
    }

    return { width, height, luma };
  } catch {
    return null;
  }
}
