import sharp from 'sharp';
import { CapturedFrame } from '@cua/shared';
import { resizedDimensions } from './coordinates';

export interface EncodeOptions {
  maxDimension: number;
  quality: number;
}

export interface EncodedScreenshot {
  base64: string;
  byteLength: number;
  width: number;
  height: number;
  originalWidth: number;
  originalHeight: number;
}

/**
 * Downscales a raw frame so its longest side fits `maxDimension` and encodes
 * it as JPEG.
 */
export async function encodeScreenshot(
  frame: CapturedFrame,
  { maxDimension, quality }: EncodeOptions,
): Promise<EncodedScreenshot> {
  const target = resizedDimensions(frame.width, frame.height, maxDimension);

  let pipeline = sharp(frame.data, {
    raw: {
      width: frame.width,
      height: frame.height,
      channels: frame.channels,
    },
  });

  if (target.width !== frame.width || target.height !== frame.height) {
    pipeline = pipeline.resize(target.width, target.height, {
      fit: 'fill',
      kernel: sharp.kernel.lanczos3,
    });
  }

  const buffer = await pipeline.jpeg({ quality }).toBuffer();

  return {
    base64: buffer.toString('base64'),
    byteLength: buffer.length,
    width: target.width,
    height: target.height,
    originalWidth: frame.width,
    originalHeight: frame.height,
  };
}
