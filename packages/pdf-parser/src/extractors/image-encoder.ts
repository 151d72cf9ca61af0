import { PNG } from 'pngjs';

/**
 * Pixel layouts produced by pdfjs image decoding (ImageKind)
 */
export const IMAGE_KIND = {
  GRAYSCALE_1BPP: 1,
  RGB_24BPP: 2,
  RGBA_32BPP: 3,
} as const;

export type ImageKind = (typeof IMAGE_KIND)[keyof typeof IMAGE_KIND];

/**
 * Raw pixels of a decoded PDF image
 */
export interface DecodedImage {
  width: number;
  height: number;
  kind: ImageKind;
  data: Uint8Array | Uint8ClampedArray;
}

/**
 * Convert decoded pixels to RGBA, one byte per channel.
 *
 * 1bpp rows are padded to a whole byte; a set bit is white.
 */
export function toRgba(image: DecodedImage): Uint8Array {
  const { width, height, kind, data } = image;
  const rgba = new Uint8Array(width * height * 4);

  if (kind === IMAGE_KIND.RGBA_32BPP) {
    rgba.set(data.subarray(0, rgba.length));
    return rgba;
  }

  if (kind === IMAGE_KIND.RGB_24BPP) {
    for (let src = 0, dst = 0; dst < rgba.length; src += 3, dst += 4) {
      rgba[dst] = data[src] ?? 0;
      rgba[dst + 1] = data[src + 1] ?? 0;
      rgba[dst + 2] = data[src + 2] ?? 0;
      rgba[dst + 3] = 255;
    }
    return rgba;
  }

  const rowBytes = (width + 7) >> 3;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const byte = data[y * rowBytes + (x >> 3)] ?? 0;
      const value = byte & (0x80 >> (x & 7)) ? 255 : 0;
      const dst = (y * width + x) * 4;
      rgba[dst] = value;
      rgba[dst + 1] = value;
      rgba[dst + 2] = value;
      rgba[dst + 3] = 255;
    }
  }
  return rgba;
}

/**
 * Encode decoded PDF image pixels as a PNG file
 */
export function encodePng(image: DecodedImage): Uint8Array {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(toRgba(image));
  return new Uint8Array(PNG.sync.write(png));
}

/**
 * Type guard for the objects pdfjs stores for painted images
 */
export function isDecodedImage(value: unknown): value is DecodedImage {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (
    !('width' in value) ||
    !('height' in value) ||
    !('kind' in value) ||
    !('data' in value)
  ) {
    return false;
  }
  const { width, height, kind, data } = value;
  return (
    typeof width === 'number' &&
    typeof height === 'number' &&
    width > 0 &&
    height > 0 &&
    (kind === IMAGE_KIND.GRAYSCALE_1BPP ||
      kind === IMAGE_KIND.RGB_24BPP ||
      kind === IMAGE_KIND.RGBA_32BPP) &&
    (data instanceof Uint8Array || data instanceof Uint8ClampedArray)
  );
}
