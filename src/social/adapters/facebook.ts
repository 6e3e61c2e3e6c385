import type { FacebookCredentials } from '../../config.js';
import { errorMessage } from '../../errors.js';
import { prepareImage, toBlob } from '../media.js';
import { failure, type PlatformAdapter, type PlatformResult, type PublishInput } from '../types.js';

const GRAPH_API_URL = 'https://graph.facebook.com/v19.0';

const IMAGE_SPEC = { maxWidth: 1200, maxHeight: 1200, fit: 'inside', maxBytes: 4 * 1024 * 1024 } as const;

/** Uploads a photo with caption to a Facebook Page. */
export function createFacebookAdapter(credentials?: FacebookCredentials): PlatformAdapter {
  async function publish({ text, imagePath, signal }: PublishInput): Promise<PlatformResult> {
    if (!credentials) {
      return failure('facebook', 'Facebook credentials not configured. Set FB_PAGE_ID, FB_PAGE_ACCESS_TOKEN.');
    }

    try {
      const image = await prepareImage(imagePath, IMAGE_SPEC);
      const form = new FormData();
      form.append('source', toBlob(image), image.filename);
      form.append('message', text);
      form.append('access_token', credentials.pageAccessToken);

      const res = await fetch(`${GRAPH_API_URL}/${credentials.pageId}/photos`, {
        method: 'POST',
        body: form,
        signal,
      });

      if (!res.ok) {
        const body = await res.text();
        return failure('facebook', `Facebook API ${res.status}: ${body}`);
      }

      const data = (await res.json()) as { id?: string; post_id?: string };
      const postId = data.post_id || data.id;

      return {
        platform: 'facebook',
        success: true,
        postId,
        url: postId ? `https://www.facebook.com/${postId}` : undefined,
      };
    } catch (err) {
      return failure('facebook', errorMessage(err), err);
    }
  }

  return { platform: 'facebook', publish };
}
