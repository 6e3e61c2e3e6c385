import type { AppConfig } from '../../config.js';
import type { Platform } from '../../content/types.js';
import type { PlatformAdapter } from '../types.js';
import { createDiscordAdapter } from './discord.js';
import { createFacebookAdapter } from './facebook.js';
import { createInstagramAdapter } from './instagram.js';
import { createLinkedInAdapter } from './linkedin.js';
import { createTwitterAdapter } from './twitter.js';

export type AdapterMap = Record<Platform, PlatformAdapter>;

/**
 * Builds one adapter per platform, each holding its own credentials.
 * To add a new platform: extend PLATFORMS, create an adapter file, add it here.
 */
export function createAdapters(config: Pick<AppConfig, 'credentials' | 'publicBaseUrl'>): AdapterMap {
  const { credentials } = config;
  return {
    twitter: createTwitterAdapter(credentials.twitter),
    instagram: createInstagramAdapter(credentials.instagram, config.publicBaseUrl),
    linkedin: createLinkedInAdapter(credentials.linkedin),
    facebook: createFacebookAdapter(credentials.facebook),
    discord: createDiscordAdapter(credentials.discord),
  };
}
