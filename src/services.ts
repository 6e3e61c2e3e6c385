import type { AppConfig } from './config.js';
import { ContentService } from './content/index.js';
import { ImageGenerator } from './content/image.js';
import { NewsFetcher } from './content/news.js';
import { TextGenerator } from './content/text.js';
import { createAdapters } from './social/adapters/index.js';
import { SocialDistributor } from './social/index.js';

/** Builds the process-wide clients once; the HTTP app and the CLI share them. */
export function createServices(config: AppConfig): ContentService {
  const news = new NewsFetcher({ apiKey: config.news.apiKey, defaultTopic: config.news.defaultTopic });

  return new ContentService({
    news,
    text: new TextGenerator({ apiKey: config.text.apiKey, model: config.text.model, news }),
    image: new ImageGenerator({
      apiKey: config.image.apiKey,
      model: config.image.model,
      outputDir: config.image.outputDir,
      templatePath: config.image.templatePath,
      maxAttempts: config.image.maxAttempts,
      baseDelayMs: config.image.baseDelayMs,
    }),
    social: new SocialDistributor(createAdapters(config)),
  });
}
