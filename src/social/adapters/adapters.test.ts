import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { jsonResponse, makeTempDir, writeJpeg } from '../../test/helpers.js';
import type { PlatformResult } from '../types.js';
import { createDiscordAdapter } from './discord.js';
import { createFacebookAdapter } from './facebook.js';
import { createInstagramAdapter } from './instagram.js';
import { createLinkedInAdapter } from './linkedin.js';
import { createTwitterAdapter } from './twitter.js';

const twitterCreds = {
  apiKey: 'test-key',
  apiSecret: 'test-secret',
  accessToken: 'test-token',
  accessTokenSecret: 'test-token-secret',
};

function errorOf(result: PlatformResult): string {
  if (result.success) throw new Error(`expected ${result.platform} to fail`);
  return result.error.message;
}

function formBody(init: RequestInit | undefined): FormData {
  const body = init?.body;
  if (!(body instanceof FormData)) throw new Error('expected a multipart body');
  return body;
}

describe('platform adapters', () => {
  let imagePath: string;
  let fetchMock: Mock<typeof fetch>;

  beforeEach(async () => {
    imagePath = await writeJpeg(path.join(await makeTempDir(), 'generated_1.jpg'));
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('twitter', () => {
    it('uploads media then creates a tweet with OAuth headers', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ media_id_string: 'm-1' }))
        .mockResolvedValueOnce(jsonResponse({ data: { id: 't-1' } }, 201));

      const result = await createTwitterAdapter(twitterCreds).publish({ text: 'Hello', imagePath });

      expect(result).toEqual({ platform: 'twitter', success: true, postId: 't-1', url: 'https://x.com/i/status/t-1' });
      expect(fetchMock).toHaveBeenCalledTimes(2);

      const [uploadUrl, uploadInit] = fetchMock.mock.calls[0];
      expect(uploadUrl).toBe('https://upload.twitter.com/1.1/media/upload.json');
      expect(new Headers(uploadInit?.headers).get('Authorization')).toMatch(/^OAuth /);
      expect(formBody(uploadInit).get('media')).toBeInstanceOf(Blob);

      const [tweetUrl, tweetInit] = fetchMock.mock.calls[1];
      expect(tweetUrl).toBe('https://api.twitter.com/2/tweets');
      expect(new Headers(tweetInit?.headers).get('Authorization')).toContain('oauth_consumer_key="test-key"');
      expect(JSON.parse(String(tweetInit?.body))).toEqual({ text: 'Hello', media: { media_ids: ['m-1'] } });
    });

    it('truncates text over 280 characters', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ media_id_string: 'm-1' }))
        .mockResolvedValueOnce(jsonResponse({ data: { id: 't-1' } }, 201));

      await createTwitterAdapter(twitterCreds).publish({ text: 'a'.repeat(300), imagePath });

      const tweet = JSON.parse(String(fetchMock.mock.calls[1][1]?.body));
      expect(tweet.text).toBe(`${'a'.repeat(277)}...`);
    });

    it('truncates before an emoji instead of splitting it', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ media_id_string: 'm-1' }))
        .mockResolvedValueOnce(jsonResponse({ data: { id: 't-1' } }, 201));

      await createTwitterAdapter(twitterCreds).publish({ text: 'a'.repeat(276) + '🚀' + 'b'.repeat(30), imagePath });

      const tweet = JSON.parse(String(fetchMock.mock.calls[1][1]?.body));
      expect(tweet.text).toBe(`${'a'.repeat(276)}...`);
    });

    it('fails without calling the API when credentials are missing', async () => {
      const result = await createTwitterAdapter(undefined).publish({ text: 'Hello', imagePath });

      expect(errorOf(result)).toBe(
        'X API credentials not configured. Set X_API_KEY, X_API_SECRET, X_ACCESS_TOKEN, X_ACCESS_TOKEN_SECRET.',
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('returns a failure on a rejected tweet', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ media_id_string: 'm-1' }))
        .mockResolvedValueOnce(new Response('duplicate content', { status: 403 }));

      const result = await createTwitterAdapter(twitterCreds).publish({ text: 'Hello', imagePath });

      expect(errorOf(result)).toBe('X API 403: duplicate content');
    });

    it('returns a failure on a network error', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      const result = await createTwitterAdapter(twitterCreds).publish({ text: 'Hello', imagePath });

      expect(errorOf(result)).toBe('fetch failed');
    });
  });

  describe('discord', () => {
    it('posts the text and image to the webhook', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ id: 'd-1' }));

      const result = await createDiscordAdapter({ webhookUrl: 'https://discord.test/api/webhooks/1/abc' }).publish({
        text: 'Hello Discord',
        imagePath,
      });

      expect(result).toEqual({ platform: 'discord', success: true, postId: 'd-1' });
      const [url, init] = fetchMock.mock.calls[0];
      expect(String(url)).toBe('https://discord.test/api/webhooks/1/abc?wait=true');
      const form = formBody(init);
      expect(form.get('payload_json')).toBe(JSON.stringify({ content: 'Hello Discord' }));
      expect(form.get('files[0]')).toBeInstanceOf(Blob);
    });

    it('fails when the webhook is not configured', async () => {
      const result = await createDiscordAdapter(undefined).publish({ text: 'Hello', imagePath });

      expect(errorOf(result)).toBe('Discord webhook not configured. Set DISCORD_WEBHOOK_URL.');
    });
  });

  describe('facebook', () => {
    const creds = { pageId: 'page-1', pageAccessToken: 'test-token' };

    it('uploads a photo to the page', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ id: 'photo-1', post_id: 'page-1_post-1' }));

      const result = await createFacebookAdapter(creds).publish({ text: 'Hello Facebook', imagePath });

      expect(result).toEqual({
        platform: 'facebook',
        success: true,
        postId: 'page-1_post-1',
        url: 'https://www.facebook.com/page-1_post-1',
      });
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://graph.facebook.com/v19.0/page-1/photos');
      const form = formBody(init);
      expect(form.get('message')).toBe('Hello Facebook');
      expect(form.get('access_token')).toBe('test-token');
    });

    it('reports the status and body of a rejected upload', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ error: { message: 'Invalid OAuth access token' } }, 401));

      const result = await createFacebookAdapter(creds).publish({ text: 'Hello', imagePath });

      expect(errorOf(result)).toBe('Facebook API 401: {"error":{"message":"Invalid OAuth access token"}}');
    });
  });

  describe('linkedin', () => {
    const creds = { accessToken: 'test-token', authorUrn: 'urn:li:person:abc' };

    it('registers, uploads and shares the image', async () => {
      fetchMock
        .mockResolvedValueOnce(
          jsonResponse({
            value: {
              asset: 'urn:li:digitalmediaAsset:A1',
              uploadMechanism: {
                'com.linkedin.digitalmedia.uploading.MediaUploadHttpRequest': {
                  uploadUrl: 'https://upload.linkedin.test/a1',
                },
              },
            },
          }),
        )
        .mockResolvedValueOnce(new Response(null, { status: 201 }))
        .mockResolvedValueOnce(new Response('{}', { status: 201, headers: { 'x-restli-id': 'urn:li:share:9' } }));

      const result = await createLinkedInAdapter(creds).publish({ text: 'Hello LinkedIn', imagePath });

      expect(result).toEqual({
        platform: 'linkedin',
        success: true,
        postId: 'urn:li:share:9',
        url: 'https://www.linkedin.com/feed/update/urn:li:share:9',
      });
      expect(fetchMock.mock.calls.map(([url]) => String(url))).toEqual([
        'https://api.linkedin.com/v2/assets?action=registerUpload',
        'https://upload.linkedin.test/a1',
        'https://api.linkedin.com/v2/ugcPosts',
      ]);
      expect(fetchMock.mock.calls[1][1]?.method).toBe('PUT');

      const share = JSON.parse(String(fetchMock.mock.calls[2][1]?.body));
      expect(share.author).toBe('urn:li:person:abc');
      expect(share.specificContent['com.linkedin.ugc.ShareContent'].shareCommentary.text).toBe('Hello LinkedIn');
      expect(share.specificContent['com.linkedin.ugc.ShareContent'].media).toEqual([
        { status: 'READY', media: 'urn:li:digitalmediaAsset:A1' },
      ]);
    });

    it('stops when registration fails', async () => {
      fetchMock.mockResolvedValueOnce(new Response('forbidden', { status: 403 }));

      const result = await createLinkedInAdapter(creds).publish({ text: 'Hello', imagePath });

      expect(errorOf(result)).toBe('LinkedIn register upload 403: forbidden');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('instagram', () => {
    const creds = { accessToken: 'test-token', businessId: 'ig-1' };

    it('creates and publishes a container from the public image URL', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ id: 'container-1' })).mockResolvedValueOnce(jsonResponse({ id: 'media-1' }));

      const result = await createInstagramAdapter(creds, 'https://content.example.com').publish({
        text: 'Hello Instagram',
        imagePath,
      });

      expect(result).toEqual({ platform: 'instagram', success: true, postId: 'media-1' });
      const [containerUrl, containerInit] = fetchMock.mock.calls[0];
      expect(containerUrl).toBe('https://graph.facebook.com/v19.0/ig-1/media');
      expect(JSON.parse(String(containerInit?.body))).toEqual({
        image_url: 'https://content.example.com/content/image/generated_1.jpg',
        caption: 'Hello Instagram',
        access_token: 'test-token',
      });
      const [publishUrl, publishInit] = fetchMock.mock.calls[1];
      expect(publishUrl).toBe('https://graph.facebook.com/v19.0/ig-1/media_publish');
      expect(JSON.parse(String(publishInit?.body))).toEqual({ creation_id: 'container-1', access_token: 'test-token' });
    });

    it('fails without a public base URL', async () => {
      const result = await createInstagramAdapter(creds, undefined).publish({ text: 'Hello', imagePath });

      expect(errorOf(result)).toBe('Instagram needs a public image URL. Set PUBLIC_BASE_URL.');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('reports the Graph API error message', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ error: { message: 'Invalid image URL' } }, 400));

      const result = await createInstagramAdapter(creds, 'https://content.example.com').publish({
        text: 'Hello',
        imagePath,
      });

      expect(errorOf(result)).toBe('Instagram media container 400: Invalid image URL');
    });
  });
});
