import type { LinkedInCredentials } from '../../config.js';
import { CHARACTER_LIMITS } from '../../content/types.js';
import { errorMessage } from '../../errors.js';
import { prepareImage } from '../media.js';
import { failure, type PlatformAdapter, type PlatformResult, type PublishInput } from '../types.js';

const LINKEDIN_API_URL = 'https://api.linkedin.com/v2';

const IMAGE_SPEC = { maxWidth: 1200, maxHeight: 1200, fit: 'inside', maxBytes: 8 * 1024 * 1024 } as const;

interface RegisterUploadResponse {
  value?: {
    asset?: string;
    uploadMechanism?: {
      'com.linkedin.digitalmedia.uploading.MediaUploadHttpRequest'?: { uploadUrl?: string };
    };
  };
}

/**
 * Shares an image post as the configured author.
 * Flow: register upload -> PUT image bytes -> create UGC post referencing the asset.
 */
export function createLinkedInAdapter(credentials?: LinkedInCredentials): PlatformAdapter {
  async function publish({ text, imagePath, signal }: PublishInput): Promise<PlatformResult> {
    if (!credentials) {
      return failure('linkedin', 'LinkedIn credentials not configured. Set LINKEDIN_ACCESS_TOKEN, LINKEDIN_AUTHOR_URN.');
    }

    try {
      const headers = {
        Authorization: `Bearer ${credentials.accessToken}`,
        'Content-Type': 'application/json',
        'X-Restli-Protocol-Version': '2.0.0',
      };

      // 1. Register the upload
      const registerRes = await fetch(`${LINKEDIN_API_URL}/assets?action=registerUpload`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          registerUploadRequest: {
            recipes: ['urn:li:digitalmediaRecipe:feedshare-image'],
            owner: credentials.authorUrn,
            serviceRelationships: [{ relationshipType: 'OWNER', identifier: 'urn:li:userGeneratedContent' }],
          },
        }),
        signal,
      });

      if (!registerRes.ok) {
        const body = await registerRes.text();
        return failure('linkedin', `LinkedIn register upload ${registerRes.status}: ${body}`);
      }

      const registered = (await registerRes.json()) as RegisterUploadResponse;
      const asset = registered.value?.asset;
      const uploadUrl =
        registered.value?.uploadMechanism?.['com.linkedin.digitalmedia.uploading.MediaUploadHttpRequest']?.uploadUrl;
      if (!asset || !uploadUrl) {
        return failure('linkedin', 'LinkedIn register upload returned no asset or upload URL.');
      }

      // 2. Upload the image bytes
      const image = await prepareImage(imagePath, IMAGE_SPEC);
      const uploadRes = await fetch(uploadUrl, {
        method: 'PUT',
        headers: { Authorization: `Bearer ${credentials.accessToken}`, 'Content-Type': image.contentType },
        body: image.buffer,
        signal,
      });

      if (!uploadRes.ok) {
        const body = await uploadRes.text();
        return failure('linkedin', `LinkedIn image upload ${uploadRes.status}: ${body}`);
      }

      // 3. Create the post
      const res = await fetch(`${LINKEDIN_API_URL}/ugcPosts`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          author: credentials.authorUrn,
          lifecycleState: 'PUBLISHED',
          specificContent: {
            'com.linkedin.ugc.ShareContent': {
              shareCommentary: { text: text.slice(0, CHARACTER_LIMITS.linkedin) },
              shareMediaCategory: 'IMAGE',
              media: [{ status: 'READY', media: asset }],
            },
          },
          visibility: { 'com.linkedin.ugc.MemberNetworkVisibility': 'PUBLIC' },
        }),
        signal,
      });

      if (!res.ok) {
        const body = await res.text();
        return failure('linkedin', `LinkedIn API ${res.status}: ${body}`);
      }

      const data = (await res.json().catch(() => ({}))) as { id?: string };
      const postId = res.headers.get('x-restli-id') || data.id;

      return {
        platform: 'linkedin',
        success: true,
        postId: postId || undefined,
        url: postId ? `https://www.linkedin.com/feed/update/${postId}` : undefined,
      };
    } catch (err) {
      return failure('linkedin', errorMessage(err), err);
    }
  }

  return { platform: 'linkedin', publish };
}
