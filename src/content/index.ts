import crypto from 'crypto';
import type { SocialDistributor } from '../social/index.js';
import { withRunLog } from '../utils/runLogger.js';
import type { ImageGenerator } from './image.js';
import type { NewsFetcher } from './news.js';
import type { TextGenerator } from './text.js';
import type {
  GeneratedContent,
  GeneratedImage,
  GenerationRequest,
  NewsItem,
  Platform,
  PlatformText,
  PostRequest,
  PostResult,
} from './types.js';

export interface ContentServiceDeps {
  text: TextGenerator;
  image: ImageGenerator;
  news: NewsFetcher;
  social: SocialDistributor;
}

/** Unique per call: millisecond timestamp plus a random suffix. */
export function imageOutputName(now = Date.now()): string {
  return `generated_${now}_${crypto.randomBytes(4).toString('hex')}`;
}

/**
 * Sequences news -> text -> image for a generate request and hands post
 * requests to the distributor. Holds no per-request state.
 */
export class ContentService {
  constructor(private readonly deps: ContentServiceDeps) {}

  get imagesDir(): string {
    return this.deps.image.outputDir;
  }

  async generate(request: GenerationRequest, options: { signal?: AbortSignal } = {}): Promise<GeneratedContent> {
    return withRunLog('content-generate', async () => {
      const text = await this.deps.text.generate(request.prompt, request.includeNews, request.platforms, options);
      const image = await this.generateImage(request.prompt, options);

      return { text, imagePath: image.path, prompt: request.prompt };
    });
  }

  async generateText(prompt: string, includeNews: boolean, platforms: Platform[]): Promise<PlatformText> {
    return this.deps.text.generate(prompt, includeNews, platforms);
  }

  async generateImage(prompt: string, options: { signal?: AbortSignal } = {}): Promise<GeneratedImage> {
    const imagePrompt = await this.deps.text.enhanceImagePrompt(prompt, options);
    return this.deps.image.generate(imagePrompt, imageOutputName(), { headline: prompt, signal: options.signal });
  }

  async fetchNews(topic?: string, options: { signal?: AbortSignal } = {}): Promise<NewsItem[]> {
    return this.deps.news.fetchLatest(topic, options);
  }

  async post(request: PostRequest, options: { signal?: AbortSignal } = {}): Promise<PostResult> {
    return withRunLog('content-post', () =>
      this.deps.social.post({ text: request.text, imagePath: request.imagePath }, request.platforms, options),
    );
  }
}
