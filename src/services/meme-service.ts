import { loadMemeTemplates, type MemeTemplate } from '../config/data-tables.js';
import { UpstreamUnavailableError } from '../types/errors.js';
import { fetchJson, isRecord } from '../utils/http.js';

export interface MemeBackend {
  /** Render `caption` (one line per text box) and return the image URL. */
  render(topic: string, caption: string, signal?: AbortSignal): Promise<string>;
}

export interface ImgflipOptions {
  username: string;
  password: string;
  url?: string;
  templates?: Record<string, MemeTemplate>;
}

const DEFAULT_URL = 'https://api.imgflip.com/caption_image';

/** Split model output into caption lines, dropping numbering and quotes. */
export function parseCaptionLines(caption: string): string[] {
  return caption
    .split('\n')
    .map((line) =>
      line
        .trim()
        .replace(/^(?:\d+[.)]|[-*•]|(?:top|bottom|text\s*\d*)\s*:)\s*/i, '')
        .replace(/^["'“”]+|["'“”]+$/g, '')
        .trim(),
    )
    .filter((line) => line.length > 0);
}

function hashTopic(topic: string): number {
  let hash = 0;
  for (const char of topic.toLowerCase()) {
    hash = (hash * 31 + (char.codePointAt(0) ?? 0)) >>> 0;
  }
  return hash;
}

/**
 * Picks a template whose box count matches the caption lines, varying by
 * topic so the same room does not always get the same picture.
 */
export function chooseTemplate(
  templates: Record<string, MemeTemplate>,
  topic: string,
  lineCount: number,
): MemeTemplate {
  const all = Object.values(templates);
  if (all.length === 0) throw new Error('[Meme] No meme templates are configured.');
  const exact = all.filter((template) => template.boxes === lineCount);
  const twoBox = all.filter((template) => template.boxes === 2);
  const candidates = exact.length > 0 ? exact : twoBox.length > 0 ? twoBox : all;
  const index = hashTopic(topic) % candidates.length;
  return candidates[index] ?? all[0];
}

export class ImgflipMemeBackend implements MemeBackend {
  readonly #username: string;
  readonly #password: string;
  readonly #url: string;
  readonly #templates: Record<string, MemeTemplate>;

  constructor(options: ImgflipOptions) {
    this.#username = options.username;
    this.#password = options.password;
    this.#url = options.url ?? DEFAULT_URL;
    this.#templates = options.templates ?? loadMemeTemplates();
  }

  async render(topic: string, caption: string, signal?: AbortSignal): Promise<string> {
    if (!this.#username || !this.#password) {
      throw new UpstreamUnavailableError('imgflip', new Error('credentials are not configured'));
    }

    const lines = parseCaptionLines(caption);
    if (lines.length === 0) lines.push(topic);
    const template = chooseTemplate(this.#templates, topic, lines.length);

    const form = new URLSearchParams({
      template_id: template.id,
      username: this.#username,
      password: this.#password,
    });
    lines.slice(0, template.boxes).forEach((line, index) => {
      form.set(`boxes[${index}][text]`, line);
    });

    let body: unknown;
    try {
      body = await fetchJson(this.#url, { method: 'POST', body: form, signal });
    } catch (err) {
      throw new UpstreamUnavailableError('imgflip', err);
    }

    const data = isRecord(body) ? body.data : undefined;
    const url = isRecord(data) ? data.url : undefined;
    if (!isRecord(body) || body.success !== true || typeof url !== 'string') {
      const reason = isRecord(body) && typeof body.error_message === 'string' ? body.error_message : 'no image URL';
      throw new UpstreamUnavailableError('imgflip', new Error(reason));
    }
    return url;
  }
}
