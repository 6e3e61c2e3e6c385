import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const DEFAULT_TEMPLATE_PATH = fileURLToPath(new URL('../templates/news-template.svg', import.meta.url));

// Blank values in .env count as unset.
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  FRONTEND_URL: z.string().default('http://localhost:3000'),
  PUBLIC_BASE_URL: optionalString.pipe(z.string().url().optional()),

  // Text + image generation
  ANTHROPIC_API_KEY: optionalString,
  TEXT_MODEL: z.string().default('claude-haiku-4-5-20251001'),
  OPENAI_API_KEY: optionalString,
  IMAGE_MODEL: z.string().default('dall-e-3'),
  IMAGE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  IMAGE_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  GENERATED_IMAGES_DIR: z.string().default('public/generated_images'),
  TEMPLATE_PATH: z.string().default(DEFAULT_TEMPLATE_PATH),

  // News
  NEWS_API_KEY: optionalString,
  NEWS_DEFAULT_TOPIC: z.string().default('blockchain'),

  // Platforms
  X_API_KEY: optionalString,
  X_API_SECRET: optionalString,
  X_ACCESS_TOKEN: optionalString,
  X_ACCESS_TOKEN_SECRET: optionalString,
  INSTAGRAM_ACCESS_TOKEN: optionalString,
  INSTAGRAM_BUSINESS_ID: optionalString,
  LINKEDIN_ACCESS_TOKEN: optionalString,
  LINKEDIN_AUTHOR_URN: optionalString,
  FB_PAGE_ID: optionalString,
  FB_PAGE_ACCESS_TOKEN: optionalString,
  DISCORD_WEBHOOK_URL: optionalString,
});

export interface TwitterCredentials {
  apiKey: string;
  apiSecret: string;
  accessToken: string;
  accessTokenSecret: string;
}

export interface InstagramCredentials {
  accessToken: string;
  businessId: string;
}

export interface LinkedInCredentials {
  accessToken: string;
  authorUrn: string;
}

export interface FacebookCredentials {
  pageId: string;
  pageAccessToken: string;
}

export interface DiscordCredentials {
  webhookUrl: string;
}

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  publicBaseUrl?: string;
  text: { apiKey?: string; model: string };
  image: {
    apiKey?: string;
    model: string;
    maxAttempts: number;
    baseDelayMs: number;
    outputDir: string;
    templatePath: string;
  };
  news: { apiKey?: string; defaultTopic: string };
  credentials: {
    twitter?: TwitterCredentials;
    instagram?: InstagramCredentials;
    linkedin?: LinkedInCredentials;
    facebook?: FacebookCredentials;
    discord?: DiscordCredentials;
  };
}

/**
 * Parses the process environment into an AppConfig.
 * API keys are optional here; each client raises a ConfigurationError on
 * first use when its key is missing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment variables: ${fields.join('; ')}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    corsOrigins: e.FRONTEND_URL.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    publicBaseUrl: e.PUBLIC_BASE_URL?.replace(/\/+$/, ''),
    text: { apiKey: e.ANTHROPIC_API_KEY, model: e.TEXT_MODEL },
    image: {
      apiKey: e.OPENAI_API_KEY,
      model: e.IMAGE_MODEL,
      maxAttempts: e.IMAGE_MAX_ATTEMPTS,
      baseDelayMs: e.IMAGE_RETRY_BASE_DELAY_MS,
      outputDir: path.resolve(e.GENERATED_IMAGES_DIR),
      templatePath: path.resolve(e.TEMPLATE_PATH),
    },
    news: { apiKey: e.NEWS_API_KEY, defaultTopic: e.NEWS_DEFAULT_TOPIC },
    credentials: {
      twitter:
        e.X_API_KEY && e.X_API_SECRET && e.X_ACCESS_TOKEN && e.X_ACCESS_TOKEN_SECRET
          ? {
              apiKey: e.X_API_KEY,
              apiSecret: e.X_API_SECRET,
              accessToken: e.X_ACCESS_TOKEN,
              accessTokenSecret: e.X_ACCESS_TOKEN_SECRET,
            }
          : undefined,
      instagram:
        e.INSTAGRAM_ACCESS_TOKEN && e.INSTAGRAM_BUSINESS_ID
          ? { accessToken: e.INSTAGRAM_ACCESS_TOKEN, businessId: e.INSTAGRAM_BUSINESS_ID }
          : undefined,
      linkedin:
        e.LINKEDIN_ACCESS_TOKEN && e.LINKEDIN_AUTHOR_URN
          ? { accessToken: e.LINKEDIN_ACCESS_TOKEN, authorUrn: e.LINKEDIN_AUTHOR_URN }
          : undefined,
      facebook:
        e.FB_PAGE_ID && e.FB_PAGE_ACCESS_TOKEN
          ? { pageId: e.FB_PAGE_ID, pageAccessToken: e.FB_PAGE_ACCESS_TOKEN }
          : undefined,
      discord: e.DISCORD_WEBHOOK_URL ? { webhookUrl: e.DISCORD_WEBHOOK_URL } : undefined,
    },
  };
}
