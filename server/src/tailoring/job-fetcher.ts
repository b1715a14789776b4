import * as cheerio from 'cheerio';
import { ExtractionError, FetchError } from '../lib/errors.js';
import logger, { errorMessage } from '../lib/logger.js';

const MAX_HTML_TEXT_CHARS = 50_000;
const MAX_PLAIN_TEXT_CHARS = 10_000;

const BROWSER_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8',
  'Accept-Language': 'es-ES,es;q=0.9,en;q=0.8',
};

const NOISE_SELECTORS = 'script, style, noscript, nav, footer, header, svg, iframe, form';
const BLOCK_SELECTORS = 'p, div, section, article, main, li, tr, h1, h2, h3, h4, h5, h6, ul, ol, dd, dt';
const CONTENT_PATTERN = /content|description|job|posting/i;

/** True when the whole input is one http(s) URL. */
export function isJobUrl(input: string): boolean {
  const trimmed = input.trim();
  if (!trimmed || /\s/.test(trimmed)) return false;
  try {
    const url = new URL(trimmed);
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.length > 0;
  } catch {
    return false;
  }
}

function tidy(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\u00a0]+/g, ' ')
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function pickContentRoot($: cheerio.CheerioAPI) {
  const main = $('main').first();
  if (main.length) return main;
  const article = $('article').first();
  if (article.length) return article;

  const byAttribute = $('[class], [id]')
    .filter((_, el) => {
      const node = $(el);
      return CONTENT_PATTERN.test(node.attr('class') ?? '') || CONTENT_PATTERN.test(node.attr('id') ?? '');
    })
    .first();
  if (byAttribute.length) return byAttribute;

  return $('body').first();
}

/**
 * Readable text of an HTML page: chrome and scripts removed, paragraph
 * breaks kept, list items prefixed with `- ` so requirement lines survive.
 */
export function extractReadableText(html: string): string {
  const $ = cheerio.load(html);
  $(NOISE_SELECTORS).remove();
  $('br').replaceWith('\n');
  $('li').prepend('- ');
  $(BLOCK_SELECTORS).append('\n');

  const root = pickContentRoot($);
  const text = tidy(root.length ? root.text() : $.root().text());
  return text.length > MAX_HTML_TEXT_CHARS ? `${text.slice(0, MAX_HTML_TEXT_CHARS)}... [truncated]` : text;
}

export interface FetchJobOptions {
  timeoutMs: number;
}

/**
 * Download a job posting and return its readable text. Never retried:
 * network/HTTP failures are FetchError, unreadable bodies ExtractionError.
 */
export async function fetchJobPosting(url: string, options: FetchJobOptions): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: BROWSER_HEADERS,
      redirect: 'follow',
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (err) {
    const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
    throw new FetchError(
      url,
      timedOut
        ? `Timed out fetching ${url} after ${options.timeoutMs}ms`
        : `Error fetching ${url}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  if (!response.ok) {
    throw new FetchError(url, `Failed to fetch ${url}: HTTP ${response.status}`, { httpStatus: response.status });
  }

  let body: string;
  try {
    body = await response.text();
  } catch (err) {
    throw new FetchError(url, `Error reading response body from ${url}: ${errorMessage(err)}`, { cause: err });
  }

  const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
  let text: string;
  if (contentType.includes('text/plain')) {
    text = tidy(body).slice(0, MAX_PLAIN_TEXT_CHARS);
  } else if (!contentType || contentType.includes('html') || contentType.includes('xml')) {
    text = extractReadableText(body);
  } else {
    throw new ExtractionError(`Unsupported content type "${contentType}" at ${url}`);
  }

  if (!text) {
    throw new ExtractionError(`No readable text found at ${url}`);
  }

  logger.debug({ url, chars: text.length }, 'Fetched job posting');
  return text;
}
