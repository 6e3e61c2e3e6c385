import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import sharp from 'sharp';
import { vi } from 'vitest';
import type { MessagesClient } from '../content/text.js';

export const TEMPLATE_PATH = fileURLToPath(new URL('../../templates/news-template.svg', import.meta.url));

export async function makeTempDir(prefix = 'content-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function solidPng(width = 64, height = 64, color = '#3366cc'): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: color } }).png().toBuffer();
}

export async function writeJpeg(filePath: string, width = 400, height = 400): Promise<string> {
  await sharp({ create: { width, height, channels: 3, background: '#cc6633' } }).jpeg().toFile(filePath);
  return filePath;
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export function imageApiResponse(b64: string): Response {
  return jsonResponse({ created: 1, data: [{ b64_json: b64 }] });
}

/** Stub for the Anthropic messages client; `reply` maps a system prompt to the model's text. */
export function stubMessagesClient(reply: (system: string, userPrompt: string) => string) {
  type CreateParams = Parameters<MessagesClient['messages']['create']>;
  const create = vi.fn(async (params: CreateParams[0], _options?: CreateParams[1]) => ({
    content: [{ type: 'text', text: reply(params.system ?? '', params.messages[0]?.content ?? '') }],
    usage: { input_tokens: 10, output_tokens: 20 },
  }));
  const client: MessagesClient = { messages: { create } };
  return { client, create };
}
