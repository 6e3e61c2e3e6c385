import type { Platform } from '../content/types.js';
import { PlatformPostError } from '../errors.js';

export type PlatformResult =
  | { platform: Platform; success: true; postId?: string; url?: string }
  | { platform: Platform; success: false; error: PlatformPostError };

export interface PublishInput {
  text: string;
  imagePath: string;
  signal?: AbortSignal;
}

/** One platform's posting capability. Adapters never throw. */
export interface PlatformAdapter {
  readonly platform: Platform;
  publish(input: PublishInput): Promise<PlatformResult>;
}

export function failure(platform: Platform, message: string, cause?: unknown): PlatformResult {
  return { platform, success: false, error: new PlatformPostError(platform, message, { cause }) };
}
