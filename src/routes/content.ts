import { promises as fs } from 'fs';
import path from 'path';
import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { ContentService } from '../content/index.js';
import { PLATFORMS, type PlatformText } from '../content/types.js';
import { ValidationError } from '../errors.js';

const platformSchema = z.enum(PLATFORMS);

const generateSchema = z.object({
  prompt: z.string().trim().min(1, 'prompt is required'),
  include_news: z.boolean().default(false),
  platforms: z.array(platformSchema).min(1, 'at least one platform is required'),
});

const postSchema = z.object({
  text: z.record(platformSchema, z.string()),
  image_path: z.string().min(1, 'image_path is required'),
  platforms: z.array(platformSchema).min(1, 'at least one platform is required'),
});

const SAFE_FILENAME = /^[\w-]+(\.[\w-]+)*$/;

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
    throw new ValidationError(message, parsed.error.issues);
  }
  return parsed.data;
}

/** Aborts when the client goes away before the response is written. */
function requestSignal(req: Request, res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort(new Error(`${req.method} ${req.path} aborted by client`));
  });
  return controller.signal;
}

function isInside(dir: string, target: string): boolean {
  const relative = path.relative(dir, target);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

export function createContentRouter(content: ContentService): Router {
  const router = Router();

  // ─── POST /content/generate ─────────────────────────────────────────────────
  // Generates per-platform text and one composited image.
  router.post('/content/generate', async (req, res) => {
    const body = parseBody(generateSchema, req.body);
    const platforms = [...new Set(body.platforms)];

    const generated = await content.generate(
      { prompt: body.prompt, includeNews: body.include_news, platforms },
      { signal: requestSignal(req, res) },
    );

    res.json({
      text: generated.text,
      image_path: generated.imagePath,
      prompt: generated.prompt,
    });
  });

  // ─── POST /content/post-to-social-media ─────────────────────────────────────
  // Posts to each platform independently. Always 200 once the body is valid;
  // per-platform failures, including a platform with no text, are reported in
  // failed_platforms.
  router.post('/content/post-to-social-media', async (req, res) => {
    const body = parseBody(postSchema, req.body);
    const platforms = [...new Set(body.platforms)];
    const text: PlatformText = body.text;

    const imagePath = path.resolve(content.imagesDir, body.image_path);
    if (!isInside(content.imagesDir, imagePath)) {
      throw new ValidationError('image_path must reference a generated image.');
    }

    const result = await content.post({ text, imagePath, platforms }, { signal: requestSignal(req, res) });

    res.json({
      successful_platforms: result.successfulPlatforms,
      failed_platforms: result.failedPlatforms,
    });
  });

  // ─── GET /content/image/:filename ───────────────────────────────────────────
  // Serves a previously generated image. Unknown or unsafe names are 404.
  router.get('/content/image/:filename', async (req, res) => {
    const { filename } = req.params;
    const filePath = path.join(content.imagesDir, filename);

    const found =
      SAFE_FILENAME.test(filename) &&
      (await fs.stat(filePath).then(
        (stat) => stat.isFile(),
        () => false,
      ));

    if (!found) {
      res.status(404).json({ error: 'Image not found' });
      return;
    }

    res.sendFile(filePath, (err) => {
      if (err && !res.headersSent) {
        res.status(404).json({ error: 'Image not found' });
      }
    });
  });

  return router;
}
