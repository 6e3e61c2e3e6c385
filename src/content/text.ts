import Anthropic from '@anthropic-ai/sdk';
import { ConfigurationError, GenerationError, errorMessage } from '../errors.js';
import { truncateWithEllipsis } from '../utils/truncate.js';
import { formatNewsContext, type NewsFetcher } from './news.js';
import { CHARACTER_LIMITS, type Platform, type PlatformText } from './types.js';

/**
 * The slice of the Anthropic client the generator calls.
 * Tests pass a stub with the same shape.
 */
export interface MessagesClient {
  messages: {
    create(
      params: {
        model: string;
        max_tokens: number;
        system?: string;
        messages: { role: 'user' | 'assistant'; content: string }[];
      },
      options?: { signal?: AbortSignal },
    ): Promise<{
      content: { type: string; text?: string }[];
      usage?: { input_tokens: number; output_tokens: number };
    }>;
  };
}

export interface TextGeneratorOptions {
  apiKey?: string;
  model: string;
  news?: NewsFetcher;
  client?: MessagesClient;
}

const PLATFORM_GUIDANCE: Record<Platform, string> = {
  twitter: `## Platform: X (Twitter)
- HARD LIMIT: Maximum 280 characters including hashtags. Count carefully. Do not exceed 280.
- Strong hook in the first line.
- 1–2 trending, relevant hashtags at the end.
- At most one emoji.
- Single tweet only — no threads.`,
  instagram: `## Platform: Instagram
- HARD LIMIT: Maximum 2,200 characters.
- Open with a line that works as a caption hook.
- Use emojis to break up the text.
- 8–15 relevant hashtags at the end, mixing broad and niche tags.`,
  linkedin: `## Platform: LinkedIn
- HARD LIMIT: Maximum 3,000 characters. Use line breaks for readability.
- Professional tone. Give the reader a concrete takeaway.
- 3–5 relevant hashtags at the end.
- No more than two emojis.`,
  facebook: `## Platform: Facebook
- Keep it under 1,000 characters even though the platform allows more.
- Conversational tone, end with a question that invites comments.
- 2–3 hashtags at most. Emojis are welcome.`,
  discord: `## Platform: Discord
- HARD LIMIT: Maximum 2,000 characters.
- Written for a community channel: friendly, direct, skimmable.
- Discord markdown is allowed for emphasis. Hashtags are optional.`,
};

function getSystemPrompt(platform: Platform): string {
  return `You are a social media content creator. You write engaging, informative posts that are accurate and specific.

## Rules
- Only use facts from the topic and any news context provided — never invent statistics or quotes.
- Sound human, not like a press release.
- Do NOT say "game-changer", "revolutionize" or "unlock".

${PLATFORM_GUIDANCE[platform]}

Produce the post text only. No quotes, no labels, no explanation.`;
}

// Instruction markers, markdown emphasis and bracketed notes the model sometimes leaks.
const NOISE_PATTERN = /(\[\/INST\]|\[INST\]|<\/s>|<\|start_of_turn\|>|<\|end_of_turn\|>|\*+|\[[^\]]*\])/g;

export function cleanText(text: string): string {
  return text
    .replace(NOISE_PATTERN, '')
    .replace(/[ \t]{2,}/g, ' ')
    .trim();
}

/**
 * Trims text to the last whole sentence that fits within `limit`.
 * When not even the first sentence fits, cuts hard and appends an ellipsis.
 */
export function trimToLimit(text: string, limit: number): string {
  if (text.length <= limit) return text;

  // Odd indexes hold the whitespace between sentences, so paragraph breaks survive.
  const parts = text.split(/(?<=[.!?])(\s+)/);
  let trimmed = parts[0].length <= limit ? parts[0] : '';
  for (let i = 1; trimmed && i + 1 < parts.length; i += 2) {
    const candidate = trimmed + parts[i] + parts[i + 1];
    if (candidate.length > limit) break;
    trimmed = candidate;
  }

  if (trimmed) return trimmed;
  return truncateWithEllipsis(text, limit);
}

export class TextGenerator {
  private readonly model: string;
  private readonly news?: NewsFetcher;
  private readonly apiKey?: string;
  private client?: MessagesClient;

  constructor(options: TextGeneratorOptions) {
    this.model = options.model;
    this.news = options.news;
    this.apiKey = options.apiKey;
    this.client = options.client;
  }

  private getClient(): MessagesClient {
    if (!this.client) {
      if (!this.apiKey) {
        throw new ConfigurationError('Text generation API key not configured. Set ANTHROPIC_API_KEY.');
      }
      this.client = new Anthropic({ apiKey: this.apiKey });
    }
    return this.client;
  }

  /**
   * Generates one post per requested platform.
   * Any provider failure aborts the whole call with a GenerationError.
   */
  async generate(
    prompt: string,
    includeNews: boolean,
    platforms: Platform[],
    options: { signal?: AbortSignal } = {},
  ): Promise<PlatformText> {
    const client = this.getClient();
    const userPrompt = await this.buildUserPrompt(prompt, includeNews, options.signal);

    const entries = await Promise.all(
      [...new Set(platforms)].map(async (platform) => {
        const raw = await this.complete(client, getSystemPrompt(platform), userPrompt, 1024, options.signal);
        const text = trimToLimit(cleanText(raw), CHARACTER_LIMITS[platform]);
        if (!text) {
          throw new GenerationError(`Empty ${platform} post after cleanup.`);
        }
        console.log(`[content/text] Generated ${platform} post (${text.length} chars)`);
        return [platform, text] as const;
      }),
    );

    const result: PlatformText = {};
    for (const [platform, text] of entries) {
      result[platform] = text;
    }
    return result;
  }

  /** Rewrites a prompt for photorealistic image generation. Falls back to the original prompt. */
  async enhanceImagePrompt(prompt: string, options: { signal?: AbortSignal } = {}): Promise<string> {
    try {
      const client = this.getClient();
      const enhanced = await this.complete(
        client,
        'You write prompts for an image generation model. Return only the prompt.',
        `Enhance this prompt for a photorealistic image without any text in it: "${prompt}"`,
        300,
        options.signal,
      );
      return cleanText(enhanced) || prompt;
    } catch (err) {
      if (options.signal?.aborted) throw err;
      console.warn(`[content/text] Prompt enhancement failed, using original prompt: ${errorMessage(err)}`);
      return prompt;
    }
  }

  private async buildUserPrompt(prompt: string, includeNews: boolean, signal?: AbortSignal): Promise<string> {
    if (!includeNews || !this.news) {
      return `Write a social media post about the following topic: ${prompt}`;
    }

    const items = await this.news.fetchLatest(prompt, { signal });
    const context =
      items.length > 0
        ? formatNewsContext(items)
        : `No recent news articles found for "${prompt}". Write from general knowledge about this topic.`;

    return `Based on the following news about "${prompt}", write an engaging social media post. Do not just list the news; give a cohesive take on it.

News context:
${context}`;
  }

  private async complete(
    client: MessagesClient,
    system: string,
    userPrompt: string,
    maxTokens: number,
    signal?: AbortSignal,
  ): Promise<string> {
    let response: Awaited<ReturnType<MessagesClient['messages']['create']>>;
    try {
      response = await client.messages.create(
        {
          model: this.model,
          max_tokens: maxTokens,
          system,
          messages: [{ role: 'user', content: userPrompt }],
        },
        { signal },
      );
    } catch (err) {
      throw new GenerationError(`Text generation failed: ${errorMessage(err)}`, undefined, { cause: err });
    }

    const text = response.content
      .map((block) => (block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
      .join('')
      .trim();
    if (!text) {
      throw new GenerationError('Empty response from text generation model.');
    }

    const totalTokens = (response.usage?.input_tokens ?? 0) + (response.usage?.output_tokens ?? 0);
    console.log(`[content/text] Completion used ${totalTokens} tokens`);
    return text;
  }
}
