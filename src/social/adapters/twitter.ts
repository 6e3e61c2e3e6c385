import OAuth from 'oauth-1.0a';
import crypto from 'crypto';
import type { TwitterCredentials } from '../../config.js';
import { CHARACTER_LIMITS } from '../../content/types.js';
import { errorMessage } from '../../errors.js';
import { truncateWithEllipsis } from '../../utils/truncate.js';
import { prepareImage, toBlob } from '../media.js';
import { failure, type PlatformAdapter, type PlatformResult, type PublishInput } from '../types.js';

const TWITTER_MEDIA_UPLOAD_URL = 'https://upload.twitter.com/1.1/media/upload.json';
const TWITTER_TWEET_URL = 'https://api.twitter.com/2/tweets';

const IMAGE_SPEC = { maxWidth: 1024, maxHeight: 1024, fit: 'inside', maxBytes: 5 * 1024 * 1024 } as const;

/**
 * Posts a tweet with one image: v1.1 media upload, then v2 tweet create.
 * Both calls use OAuth 1.0a user-context auth.
 */
export function createTwitterAdapter(credentials?: TwitterCredentials): PlatformAdapter {
  async function publish({ text, imagePath, signal }: PublishInput): Promise<PlatformResult> {
    if (!credentials) {
      return failure(
        'twitter',
        'X API credentials not configured. Set X_API_KEY, X_API_SECRET, X_ACCESS_TOKEN, X_ACCESS_TOKEN_SECRET.',
      );
    }

    try {
      const oauth = new OAuth({
        consumer: { key: credentials.apiKey, secret: credentials.apiSecret },
        signature_method: 'HMAC-SHA1',
        hash_function(baseString: string, key: string) {
          return crypto.createHmac('sha1', key).update(baseString).digest('base64');
        },
      });
      const token = { key: credentials.accessToken, secret: credentials.accessTokenSecret };

      // Multipart bodies are not part of the OAuth 1.0a signature base string.
      const image = await prepareImage(imagePath, IMAGE_SPEC);
      const form = new FormData();
      form.append('media', toBlob(image), image.filename);

      const uploadAuth = oauth.toHeader(oauth.authorize({ url: TWITTER_MEDIA_UPLOAD_URL, method: 'POST' }, token));
      const uploadRes = await fetch(TWITTER_MEDIA_UPLOAD_URL, {
        method: 'POST',
        headers: { ...uploadAuth },
        body: form,
        signal,
      });

      if (!uploadRes.ok) {
        const body = await uploadRes.text();
        return failure('twitter', `X media upload ${uploadRes.status}: ${body}`);
      }

      const upload = (await uploadRes.json()) as { media_id_string?: string };
      if (!upload.media_id_string) {
        return failure('twitter', 'X media upload returned no media id.');
      }

      // X enforces 280 chars. Truncate with ellipsis if needed.
      const tweetText = truncateWithEllipsis(text, CHARACTER_LIMITS.twitter);

      const tweetAuth = oauth.toHeader(oauth.authorize({ url: TWITTER_TWEET_URL, method: 'POST' }, token));
      const res = await fetch(TWITTER_TWEET_URL, {
        method: 'POST',
        headers: {
          ...tweetAuth,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ text: tweetText, media: { media_ids: [upload.media_id_string] } }),
        signal,
      });

      if (!res.ok) {
        const body = await res.text();
        return failure('twitter', `X API ${res.status}: ${body}`);
      }

      const data = (await res.json()) as { data?: { id?: string } };
      const postId = data.data?.id;

      return {
        platform: 'twitter',
        success: true,
        postId: postId || undefined,
        url: postId ? `https://x.com/i/status/${postId}` : undefined,
      };
    } catch (err) {
      return failure('twitter', errorMessage(err), err);
    }
  }

  return { platform: 'twitter', publish };
}
