import path from 'path';
import sharp from 'sharp';

export interface ImageSpec {
  maxWidth: number;
  maxHeight: number;
  fit: 'inside' | 'cover';
  maxBytes: number;
}

export interface PreparedImage {
  buffer: Buffer;
  contentType: 'image/jpeg';
  filename: string;
  width: number;
  height: number;
}

const QUALITY_STEPS = [85, 75, 65, 55, 45];

/**
 * Re-encodes an image as JPEG within a platform's dimension and size limits.
 * Steps quality down until the upload limit is met.
 */
export async function prepareImage(imagePath: string, spec: ImageSpec): Promise<PreparedImage> {
  const resized = await sharp(imagePath)
    .rotate()
    .resize(spec.maxWidth, spec.maxHeight, { fit: spec.fit, withoutEnlargement: spec.fit === 'inside' })
    .flatten({ background: '#ffffff' })
    .toBuffer();

  const filename = `${path.parse(imagePath).name}.jpg`;

  for (const quality of QUALITY_STEPS) {
    const { data, info } = await sharp(resized).jpeg({ quality, mozjpeg: true }).toBuffer({ resolveWithObject: true });
    if (data.length <= spec.maxBytes) {
      return { buffer: data, contentType: 'image/jpeg', filename, width: info.width, height: info.height };
    }
  }

  throw new Error(`Image exceeds ${spec.maxBytes} bytes even at quality ${QUALITY_STEPS[QUALITY_STEPS.length - 1]}`);
}

export function toBlob(image: PreparedImage): Blob {
  return new Blob([image.buffer], { type: image.contentType });
}
