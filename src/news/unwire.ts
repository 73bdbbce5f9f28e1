/**
 * unwire.hk news client. Reads the site's WordPress REST API and renders the
 * day's headlines as plain text.
 */

import { z } from 'zod';

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MAX_POSTS = 20;

export class InvalidDateError extends Error {
  constructor(public readonly input: string) {
    super(`Invalid date: ${input}`);
    this.name = 'InvalidDateError';
  }
}

export class NewsFetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NewsFetchError';
  }
}

export interface NewsClient {
  fetchNews(date?: string, signal?: AbortSignal): Promise<string>;
}

export interface UnwireClientOptions {
  baseUrl: string;
  timeZone: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

const postsSchema = z.array(
  z.object({
    link: z.string(),
    title: z.object({ rendered: z.string() }),
  })
);

/**
 * Validate a `YYYY-MM-DD` string that names a real calendar day.
 */
export function parseNewsDate(input: string): string {
  const match = DATE_RE.exec(input.trim());
  if (!match) {
    throw new InvalidDateError(input);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new InvalidDateError(input);
  }

  return `${match[1]}-${match[2]}-${match[3]}`;
}

/** Calendar date of `now` in the given IANA zone, as YYYY-MM-DD. */
export function formatDateInZone(now: Date, timeZone: string): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(now);
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

const MAX_CODE_POINT = 0x10ffff;

function fromCodePoint(codePoint: number, fallback: string): string {
  if (!Number.isFinite(codePoint) || codePoint > MAX_CODE_POINT) {
    return fallback;
  }
  return String.fromCodePoint(codePoint);
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return fromCodePoint(parseInt(entity.slice(2), 16), whole);
    }
    if (entity.startsWith('#')) {
      return fromCodePoint(parseInt(entity.slice(1), 10), whole);
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? whole;
  });
}

export function createUnwireClient(options: UnwireClientOptions): NewsClient {
  const fetchImpl = options.fetchImpl ?? fetch;
  const now = options.now ?? (() => new Date());
  const baseUrl = options.baseUrl.replace(/\/+$/, '');

  async function fetchNews(date?: string, signal?: AbortSignal): Promise<string> {
    const day = date ? parseNewsDate(date) : formatDateInZone(now(), options.timeZone);

    const params = new URLSearchParams({
      after: `${day}T00:00:00`,
      before: `${day}T23:59:59`,
      per_page: String(MAX_POSTS),
      orderby: 'date',
      order: 'desc',
      _fields: 'link,title',
    });
    const url = `${baseUrl}/wp-json/wp/v2/posts?${params}`;

    const timeout = AbortSignal.timeout(options.timeoutMs);
    const resp = await fetchImpl(url, {
      headers: { Accept: 'application/json' },
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });

    if (!resp.ok) {
      throw new NewsFetchError(`HTTP ${resp.status} ${resp.statusText}`);
    }

    let body: unknown;
    try {
      body = await resp.json();
    } catch {
      throw new NewsFetchError('Unexpected response from news API');
    }

    const parsed = postsSchema.safeParse(body);
    if (!parsed.success) {
      throw new NewsFetchError('Unexpected response from news API');
    }

    if (parsed.data.length === 0) {
      return `No news found for ${day}.`;
    }

    console.log(`[News] ${parsed.data.length} post(s) for ${day}`);

    const items = parsed.data.map((post) => `• ${decodeEntities(post.title.rendered).trim()}\n  ${post.link}`);
    return `📰 unwire.hk — ${day}\n\n${items.join('\n\n')}`;
  }

  return { fetchNews };
}
