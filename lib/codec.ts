import sharp from 'sharp';
import { DecodeError } from './errors';
import { rasterToRgb, type LumaGrid, type Raster, type RgbGrid } from './grid';

/**
 * Decode an encoded raster (JPEG/PNG/WebP/...) into sRGB samples with their
 * native channel count. EXIF orientation is applied.
 */
export async function decodeRaster(input: Uint8Array): Promise<Raster> {
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(input)
      .rotate()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new DecodeError('Input could not be decoded as an image', { cause: error });
  }

  const { data, info } = decoded;
  const { width, height, channels } = info;

  if (width * height === 0 || data.length < width * height * channels) {
    throw new DecodeError(`Decoded image has unexpected size ${width}x${height}x${channels}`);
  }

  return { width, height, channels, data };
}

/** Decode straight to packed RGB: alpha dropped, grey replicated. */
export async function decodeImage(input: Uint8Array): Promise<RgbGrid> {
  return rasterToRgb(await decodeRaster(input));
}

/** Lossless single-channel PNG. */
export async function encodePng(grid: LumaGrid): Promise<Buffer> {
  return sharp(Buffer.from(grid.data.buffer, grid.data.byteOffset, grid.data.byteLength), {
    raw: {
      width: grid.width,
      height: grid.height,
      channels: 1
    }
  })
    .png({ compressionLevel: 9, adaptiveFiltering: false, force: true })
    .toBuffer();
}
