import path from 'path';
import type { InstagramCredentials } from '../../config.js';
import { CHARACTER_LIMITS } from '../../content/types.js';
import { errorMessage } from '../../errors.js';
import { failure, type PlatformAdapter, type PlatformResult, type PublishInput } from '../types.js';

const GRAPH_API_URL = 'https://graph.facebook.com/v19.0';

interface GraphResponse {
  id?: string;
  error?: { message?: string };
}

async function graphPost(url: string, body: Record<string, string>, signal?: AbortSignal) {
  const res = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
    signal,
  });
  const data = (await res.json().catch(() => ({}))) as GraphResponse;
  return { ok: res.ok && Boolean(data.id), status: res.status, data };
}

/**
 * Publishes a single image post through the Instagram Graph API.
 * Instagram fetches the image itself, so it must be reachable at
 * `${publicBaseUrl}/content/image/<filename>`.
 */
export function createInstagramAdapter(credentials?: InstagramCredentials, publicBaseUrl?: string): PlatformAdapter {
  async function publish({ text, imagePath, signal }: PublishInput): Promise<PlatformResult> {
    if (!credentials) {
      return failure('instagram', 'Instagram credentials not configured. Set INSTAGRAM_ACCESS_TOKEN, INSTAGRAM_BUSINESS_ID.');
    }
    if (!publicBaseUrl) {
      return failure('instagram', 'Instagram needs a public image URL. Set PUBLIC_BASE_URL.');
    }

    try {
      const imageUrl = `${publicBaseUrl}/content/image/${encodeURIComponent(path.basename(imagePath))}`;
      const caption = text.slice(0, CHARACTER_LIMITS.instagram);

      // 1. Create media container
      const container = await graphPost(
        `${GRAPH_API_URL}/${credentials.businessId}/media`,
        { image_url: imageUrl, caption, access_token: credentials.accessToken },
        signal,
      );
      if (!container.ok || !container.data.id) {
        return failure(
          'instagram',
          `Instagram media container ${container.status}: ${container.data.error?.message ?? 'no container id'}`,
        );
      }

      // 2. Publish container
      const published = await graphPost(
        `${GRAPH_API_URL}/${credentials.businessId}/media_publish`,
        { creation_id: container.data.id, access_token: credentials.accessToken },
        signal,
      );
      if (!published.ok || !published.data.id) {
        return failure(
          'instagram',
          `Instagram publish ${published.status}: ${published.data.error?.message ?? 'no media id'}`,
        );
      }

      return { platform: 'instagram', success: true, postId: published.data.id };
    } catch (err) {
      return failure('instagram', errorMessage(err), err);
    }
  }

  return { platform: 'instagram', publish };
}
