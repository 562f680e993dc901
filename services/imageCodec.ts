import sharp from 'sharp';
import { ImageRaster, WallspanError } from '../core/layout';

export interface ImageCodec {
  decode: (path: string) => Promise<ImageRaster>;
  encode: (raster: ImageRaster, path: string) => Promise<void>;
}

/**
 * Repack 1-4 channel pixels as RGB: grey is replicated, alpha is dropped.
 */
export function toRgb(pixels: Uint8Array, width: number, height: number, channels: number): ImageRaster {
  if (channels === 3) {
    return { width, height, data: new Uint8Array(pixels.buffer, pixels.byteOffset, width * height * 3) };
  }

  const out = new Uint8Array(width * height * 3);
  const grey = channels < 3;
  for (let i = 0, p = 0; i < width * height; i++, p += channels) {
    const o = i * 3;
    if (grey) {
      out[o] = pixels[p];
      out[o + 1] = pixels[p];
      out[o + 2] = pixels[p];
    } else {
      out[o] = pixels[p];
      out[o + 1] = pixels[p + 1];
      out[o + 2] = pixels[p + 2];
    }
  }
  return { width, height, data: out };
}

export async function decodeImage(path: string): Promise<ImageRaster> {
  try {
    const { data, info } = await sharp(path)
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });
    return toRgb(data, info.width, info.height, info.channels);
  } catch (error) {
    throw new WallspanError('UNREADABLE_IMAGE', `Cannot read ${path} as an image.`, {
      path,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

export async function encodeImage(raster: ImageRaster, path: string): Promise<void> {
  const input = Buffer.from(raster.data.buffer, raster.data.byteOffset, raster.data.byteLength);
  try {
    await sharp(input, { raw: { width: raster.width, height: raster.height, channels: 3 } }).toFile(path);
  } catch (error) {
    throw new WallspanError('WRITE_FAILED', `Could not save to file ${path}.`, {
      path,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

export function createSharpCodec(): ImageCodec {
  return { decode: decodeImage, encode: encodeImage };
}
