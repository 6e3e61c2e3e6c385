import { promises as fs } from 'fs';
import type { Platform, PlatformText, PostResult } from '../content/types.js';
import { errorMessage } from '../errors.js';
import type { AdapterMap } from './adapters/index.js';
import { failure, type PlatformResult } from './types.js';

export interface DistributeContent {
  text: PlatformText;
  imagePath: string;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Posts generated content to each requested platform independently.
 * A failure on one platform is recorded and never aborts the others;
 * partial success is returned as-is, with no rollback.
 */
export class SocialDistributor {
  constructor(private readonly adapters: AdapterMap) {}

  async post(
    content: DistributeContent,
    platforms: Platform[],
    options: { signal?: AbortSignal } = {},
  ): Promise<PostResult> {
    const requested = [...new Set(platforms)];
    const imageExists = await fileExists(content.imagePath);

    const settled = await Promise.allSettled(
      requested.map((platform) => this.publishOne(platform, content, imageExists, options.signal)),
    );

    const result: PostResult = { successfulPlatforms: [], failedPlatforms: {} };

    settled.forEach((outcome, i) => {
      const platform = requested[i];
      const platformResult: PlatformResult =
        outcome.status === 'fulfilled' ? outcome.value : failure(platform, errorMessage(outcome.reason), outcome.reason);

      if (platformResult.success) {
        result.successfulPlatforms.push(platform);
        console.log(`[social] Posted to ${platform}. Platform ID: ${platformResult.postId || 'n/a'}`);
      } else {
        result.failedPlatforms[platform] = platformResult.error.message;
        console.error(`[social] ${platform} failed: ${platformResult.error.message}`);
      }
    });

    return result;
  }

  private async publishOne(
    platform: Platform,
    content: DistributeContent,
    imageExists: boolean,
    signal?: AbortSignal,
  ): Promise<PlatformResult> {
    const text = content.text[platform];
    if (!text) {
      return failure(platform, `No ${platform} text supplied.`);
    }
    if (!imageExists) {
      return failure(platform, `Image not found at path: ${content.imagePath}`);
    }

    console.log(`[social] Publishing to ${platform}...`);
    return this.adapters[platform].publish({ text, imagePath: content.imagePath, signal });
  }
}
