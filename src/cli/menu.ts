import path from 'path';
import type { ContentService } from '../content/index.js';
import { PLATFORMS, isPlatform, type Platform, type PlatformText } from '../content/types.js';
import { errorMessage } from '../errors.js';

export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export interface MenuIO {
  /** Resolves with the trimmed answer; rejects with InputClosedError on EOF. */
  ask(question: string): Promise<string>;
  print(line: string): void;
}

/** The parts of ContentService the menu drives. */
export type MenuContent = Pick<ContentService, 'generateText' | 'fetchNews' | 'generateImage' | 'post'>;

interface Session {
  prompt?: string;
  text?: PlatformText;
  imagePath?: string;
}

const MENU = `
1. Generate text
2. Fetch news
3. Generate image
4. Post to social media
5. Exit`;

export function parsePlatforms(answer: string, fallback: readonly Platform[] = PLATFORMS): Platform[] {
  const values = answer
    .split(',')
    .map((value) => value.trim().toLowerCase())
    .filter(Boolean);
  if (values.length === 0) return [...fallback];

  const unknown = values.filter((value) => !isPlatform(value));
  if (unknown.length > 0) {
    throw new Error(`Unknown platform(s): ${unknown.join(', ')}. Choose from ${PLATFORMS.join(', ')}.`);
  }
  return [...new Set(values.filter(isPlatform))];
}

function isYes(answer: string): boolean {
  return ['y', 'yes'].includes(answer.toLowerCase());
}

async function generateText(content: MenuContent, io: MenuIO, session: Session): Promise<void> {
  const prompt = await io.ask('Topic: ');
  if (!prompt) {
    io.print('A topic is required.');
    return;
  }
  const platforms = parsePlatforms(await io.ask(`Platforms (${PLATFORMS.join(', ')}; blank for all): `));
  const includeNews = isYes(await io.ask('Include latest news? (y/n): '));

  io.print('\n🔄 Generating content...');
  const text = await content.generateText(prompt, includeNews, platforms);
  session.prompt = prompt;
  session.text = text;

  for (const platform of platforms) {
    io.print(`\n${platform.toUpperCase()}:\n${text[platform] ?? ''}`);
  }
}

async function fetchNews(content: MenuContent, io: MenuIO): Promise<void> {
  const topic = await io.ask('News topic (blank for default): ');
  io.print('\n📰 Fetching the latest news...');
  const items = await content.fetchNews(topic || undefined);

  if (items.length === 0) {
    io.print('No articles found.');
    return;
  }
  items.forEach((item, i) => {
    io.print(`${i + 1}. ${item.title}${item.source ? ` (${item.source})` : ''}`);
  });
}

async function generateImage(content: MenuContent, io: MenuIO, session: Session): Promise<void> {
  const answer = await io.ask(`Image prompt${session.prompt ? ' (blank to reuse last topic)' : ''}: `);
  const prompt = answer || session.prompt;
  if (!prompt) {
    io.print('An image prompt is required.');
    return;
  }

  io.print('\n🎨 Generating image...');
  const image = await content.generateImage(prompt);
  session.imagePath = image.path;
  io.print(`✅ Image generated: ${image.path}`);
}

async function postToSocialMedia(content: MenuContent, io: MenuIO, session: Session): Promise<void> {
  const { text, imagePath } = session;
  if (!text || !imagePath) {
    io.print('Generate text (1) and an image (3) first.');
    return;
  }

  const generated = PLATFORMS.filter((p) => text[p]);
  const platforms = parsePlatforms(await io.ask(`Platforms (blank for ${generated.join(', ')}): `), generated);
  if (!isYes(await io.ask(`Post ${path.basename(imagePath)} to ${platforms.join(', ')}? (y/n): `))) {
    io.print('📁 Content kept locally. You can post it later.');
    return;
  }

  io.print('\n🚀 Posting to social media platforms...');
  const result = await content.post({ text, imagePath, platforms });

  if (result.successfulPlatforms.length > 0) {
    io.print(`✅ Successful: ${result.successfulPlatforms.join(', ')}`);
  }
  for (const [platform, error] of Object.entries(result.failedPlatforms)) {
    io.print(`❌ ${platform}: ${error}`);
  }
}

/** Runs the interactive menu until the user exits or input closes. */
export async function runMenu(content: MenuContent, io: MenuIO): Promise<void> {
  const session: Session = {};
  io.print('\n🤖 AI Content Creator');

  for (;;) {
    let choice: string;
    try {
      io.print(MENU);
      choice = await io.ask('\nChoose an option: ');
    } catch (err) {
      if (err instanceof InputClosedError) break;
      throw err;
    }

    try {
      switch (choice.toLowerCase()) {
        case '1':
          await generateText(content, io, session);
          break;
        case '2':
          await fetchNews(content, io);
          break;
        case '3':
          await generateImage(content, io, session);
          break;
        case '4':
          await postToSocialMedia(content, io, session);
          break;
        case '5':
        case 'exit':
        case 'q':
          io.print('\n👋 Goodbye!');
          return;
        default:
          io.print(`Unknown option "${choice}".`);
      }
    } catch (err) {
      if (err instanceof InputClosedError) break;
      io.print(`❌ Error: ${errorMessage(err)}`);
    }
  }

  io.print('\n👋 Goodbye!');
}
