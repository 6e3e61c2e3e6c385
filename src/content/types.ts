export const PLATFORMS = ['twitter', 'instagram', 'linkedin', 'facebook', 'discord'] as const;

export type Platform = (typeof PLATFORMS)[number];

/** Hard character limits each platform enforces on post text. */
export const CHARACTER_LIMITS: Record<Platform, number> = {
  twitter: 280,
  instagram: 2200,
  linkedin: 3000,
  facebook: 63206,
  discord: 2000,
};

export type PlatformText = Partial<Record<Platform, string>>;

export interface GenerationRequest {
  prompt: string;
  includeNews: boolean;
  platforms: Platform[];
}

export interface GeneratedContent {
  text: PlatformText;
  imagePath: string;
  prompt: string;
}

export interface PostRequest {
  text: PlatformText;
  imagePath: string;
  platforms: Platform[];
}

export interface PostResult {
  successfulPlatforms: Platform[];
  failedPlatforms: Partial<Record<Platform, string>>;
}

export interface NewsItem {
  title: string;
  description: string;
  url: string | null;
  source: string | null;
  publishedAt: string | null;
}

export interface GeneratedImage {
  path: string;
  filename: string;
  attempts: number;
}

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}
