import { promises as fs } from 'fs';
import path from 'path';
import { setTimeout as delay } from 'timers/promises';
import sharp from 'sharp';
import { ConfigurationError, GenerationError, errorMessage } from '../errors.js';
import type { GeneratedImage } from './types.js';

const OPENAI_IMAGES_URL = 'https://api.openai.com/v1/images/generations';

// Layout of templates/news-template.svg (1200x1200).
const CANVAS_SIZE = 1200;
const PHOTO_FRAME = { left: 100, top: 300, width: 1000, height: 760 };
const HEADLINE_BOX = { top: 60, height: 220, maxLines: 2, maxCharsPerLine: 32, fontSize: 58 };

const JPEG_QUALITY_STEPS = [80, 70, 60];
const MAX_OUTPUT_BYTES = 5 * 1024 * 1024;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ImageGeneratorOptions {
  apiKey?: string;
  model: string;
  outputDir: string;
  templatePath: string;
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: SleepFn;
}

export interface ImageGenerateOptions {
  headline?: string;
  signal?: AbortSignal;
}

class ImageRequestError extends Error {
  constructor(
    message: string,
    public transient: boolean,
  ) {
    super(message);
    this.name = 'ImageRequestError';
  }
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

/** Delay before each retry: attempt 1 fails -> base, attempt 2 fails -> 2x base, ... */
export function retryDelaySchedule(maxAttempts: number, baseDelayMs: number): number[] {
  return Array.from({ length: Math.max(0, maxAttempts - 1) }, (_, i) => baseDelayMs * (i + 1));
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Greedy word wrap by character count; the last line gets an ellipsis when text overflows. */
export function wrapHeadline(text: string, maxCharsPerLine: number, maxLines: number): string[] {
  const words = text.trim().split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let line = '';

  for (const word of words) {
    const candidate = line ? `${line} ${word}` : word;
    if (candidate.length <= maxCharsPerLine) {
      line = candidate;
      continue;
    }
    if (line) lines.push(line);
    line = word.length > maxCharsPerLine ? word.slice(0, maxCharsPerLine) : word;
  }
  if (line) lines.push(line);

  if (lines.length <= maxLines) return lines;

  const kept = lines.slice(0, maxLines);
  const last = kept[maxLines - 1];
  kept[maxLines - 1] = last.length + 3 > maxCharsPerLine ? last.slice(0, maxCharsPerLine - 3) + '...' : last + '...';
  return kept;
}

function headlineSvg(headline: string): Buffer {
  const lines = wrapHeadline(headline, HEADLINE_BOX.maxCharsPerLine, HEADLINE_BOX.maxLines);
  const lineHeight = HEADLINE_BOX.fontSize * 1.2;
  const firstBaseline = HEADLINE_BOX.height / 2 - ((lines.length - 1) * lineHeight) / 2;

  const tspans = lines
    .map((l, i) => `<tspan x="${CANVAS_SIZE / 2}" y="${firstBaseline + i * lineHeight}">${escapeXml(l)}</tspan>`)
    .join('');

  return Buffer.from(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${CANVAS_SIZE}" height="${HEADLINE_BOX.height}">` +
      `<text font-family="Arial, Helvetica, sans-serif" font-size="${HEADLINE_BOX.fontSize}" font-weight="bold" ` +
      `fill="#ffffff" text-anchor="middle" dominant-baseline="middle">${tspans}</text></svg>`,
  );
}

export class ImageGenerator {
  private readonly options: ImageGeneratorOptions;
  private readonly sleep: SleepFn;

  constructor(options: ImageGeneratorOptions) {
    this.options = options;
    this.sleep = options.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));
  }

  get outputDir(): string {
    return this.options.outputDir;
  }

  /**
   * Requests an image, composites it onto the template with a headline overlay,
   * compresses it and writes `<outputName>.jpg` to the output directory.
   * Transient provider failures are retried on a fixed schedule; nothing is
   * written when every attempt fails.
   */
  async generate(prompt: string, outputName: string, options: ImageGenerateOptions = {}): Promise<GeneratedImage> {
    const { apiKey, maxAttempts, baseDelayMs } = this.options;
    if (!apiKey) {
      throw new ConfigurationError('Image generation API key not configured. Set OPENAI_API_KEY.');
    }

    const delays = retryDelaySchedule(maxAttempts, baseDelayMs);
    let source: Buffer | undefined;
    let attempts = 0;

    while (!source) {
      attempts++;
      try {
        source = await this.requestImage(apiKey, prompt, options.signal);
      } catch (err) {
        if (options.signal?.aborted) {
          throw new GenerationError('Image generation aborted.', attempts, { cause: err });
        }
        const transient = !(err instanceof ImageRequestError) || err.transient;
        if (!transient || attempts >= maxAttempts) {
          throw new GenerationError(
            `Image generation failed after ${attempts} attempt(s): ${errorMessage(err)}`,
            attempts,
            { cause: err },
          );
        }
        const wait = delays[attempts - 1];
        console.warn(`[content/image] Attempt ${attempts}/${maxAttempts} failed (${errorMessage(err)}). Retrying in ${wait}ms.`);
        try {
          await this.sleep(wait, options.signal);
        } catch (sleepErr) {
          if (options.signal?.aborted) {
            throw new GenerationError('Image generation aborted.', attempts, { cause: sleepErr });
          }
          throw sleepErr;
        }
      }
    }

    const headline = options.headline?.trim() || prompt;
    let output: Buffer;
    try {
      output = await this.composite(source, headline);
    } catch (err) {
      throw new GenerationError(`Image compositing failed: ${errorMessage(err)}`, attempts, { cause: err });
    }

    const filename = `${outputName.replace(/[^\w-]/g, '_')}.jpg`;
    const filePath = path.join(this.options.outputDir, filename);
    await fs.mkdir(this.options.outputDir, { recursive: true });
    // 'wx' refuses to overwrite: generated files are write-once.
    await fs.writeFile(filePath, output, { flag: 'wx' });

    console.log(`[content/image] Wrote ${filename} (${output.length} bytes, ${attempts} attempt(s))`);
    return { path: filePath, filename, attempts };
  }

  private async requestImage(apiKey: string, prompt: string, signal?: AbortSignal): Promise<Buffer> {
    const res = await fetch(OPENAI_IMAGES_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model: this.options.model,
        prompt,
        n: 1,
        size: '1024x1024',
        response_format: 'b64_json',
      }),
      signal,
    });

    if (!res.ok) {
      const body = await res.text();
      throw new ImageRequestError(`Images API ${res.status}: ${body}`, isTransientStatus(res.status));
    }

    const data = (await res.json()) as { data?: { b64_json?: string }[] };
    const b64 = data.data?.[0]?.b64_json;
    if (!b64) {
      throw new ImageRequestError('No image data returned from Images API.', true);
    }
    return Buffer.from(b64, 'base64');
  }

  private async composite(source: Buffer, headline: string): Promise<Buffer> {
    const photo = await sharp(source)
      .resize(PHOTO_FRAME.width, PHOTO_FRAME.height, { fit: 'cover' })
      .toBuffer();

    const framed = await sharp(this.options.templatePath)
      .resize(CANVAS_SIZE, CANVAS_SIZE)
      .composite([
        { input: photo, left: PHOTO_FRAME.left, top: PHOTO_FRAME.top },
        { input: headlineSvg(headline), left: 0, top: HEADLINE_BOX.top },
      ])
      .png()
      .toBuffer();

    let encoded: Buffer = Buffer.alloc(0);
    for (const quality of JPEG_QUALITY_STEPS) {
      encoded = await sharp(framed).jpeg({ quality, progressive: true, mozjpeg: true }).toBuffer();
      if (encoded.length <= MAX_OUTPUT_BYTES) break;
    }
    return encoded;
  }
}
