import type { DiscordCredentials } from '../../config.js';
import { CHARACTER_LIMITS } from '../../content/types.js';
import { errorMessage } from '../../errors.js';
import { prepareImage, toBlob } from '../media.js';
import { failure, type PlatformAdapter, type PlatformResult, type PublishInput } from '../types.js';

const IMAGE_SPEC = { maxWidth: 1024, maxHeight: 1024, fit: 'inside', maxBytes: 8 * 1024 * 1024 } as const;

/** Posts text plus an image attachment through a channel webhook. */
export function createDiscordAdapter(credentials?: DiscordCredentials): PlatformAdapter {
  async function publish({ text, imagePath, signal }: PublishInput): Promise<PlatformResult> {
    if (!credentials) {
      return failure('discord', 'Discord webhook not configured. Set DISCORD_WEBHOOK_URL.');
    }

    try {
      // wait=true makes Discord return the created message instead of 204.
      const url = new URL(credentials.webhookUrl);
      url.searchParams.set('wait', 'true');

      const image = await prepareImage(imagePath, IMAGE_SPEC);
      const form = new FormData();
      form.append('payload_json', JSON.stringify({ content: text.slice(0, CHARACTER_LIMITS.discord) }));
      form.append('files[0]', toBlob(image), image.filename);

      const res = await fetch(url, { method: 'POST', body: form, signal });

      if (!res.ok) {
        const body = await res.text();
        return failure('discord', `Discord webhook ${res.status}: ${body}`);
      }

      const data = (await res.json().catch(() => ({}))) as { id?: string };
      return { platform: 'discord', success: true, postId: data.id };
    } catch (err) {
      return failure('discord', errorMessage(err), err);
    }
  }

  return { platform: 'discord', publish };
}
