import type { AppConfig } from '../../shared/config';
import { ExtractionError, errorMessage } from '../errors';
import { normalizeWhitespace, uniqueStrings } from '../utils/text';

export interface ExtractedContent {
  title: string | null;
  text: string;
  /** Scheme and host of the fetched page, e.g. `https://example.com`. */
  source: string;
  author: string | null;
  keywords: string[];
  originalLink: string;
}

export interface TextExtractor {
  extractFromUrl: (url: string, options?: { signal?: AbortSignal }) => Promise<ExtractedContent>;
}

export type ExtractionSettings = AppConfig['extraction'];

const TRUSTED_PROTOCOLS = new Set(['http:', 'https:']);

const PRIVATE_IP_RANGES = [/^127\./, /^10\./, /^192\.168\./, /^172\.(1[6-9]|2[0-9]|3[0-1])\./, /^169\.254\./, /^0\./];

const PRIVATE_IPV6_PREFIXES = ['fc', 'fd', 'fe80', '::1'];

const MAX_AUTHOR_LENGTH = 100;
const MAX_KEYWORDS = 15;

const isIpv4 = (value: string): boolean => /^(\d{1,3}\.){3}\d{1,3}$/.test(value);
const isIpv6 = (value: string): boolean => value.includes(':');

const isPrivateIp = (ip: string): boolean => {
  if (isIpv6(ip)) {
    const normalized = ip.replace(/^\[|\]$/g, '').toLowerCase();
    return PRIVATE_IPV6_PREFIXES.some((prefix) => normalized.startsWith(prefix));
  }
  return PRIVATE_IP_RANGES.some((pattern) => pattern.test(ip));
};

export const parseAllowedUrl = (rawUrl: string): URL => {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl.trim());
  } catch (error) {
    throw new ExtractionError(`Invalid URL: ${rawUrl}`, rawUrl, { cause: error });
  }
  if (!TRUSTED_PROTOCOLS.has(parsed.protocol)) {
    throw new ExtractionError(`Unsupported protocol: ${parsed.protocol}`, rawUrl);
  }
  if (parsed.hostname === 'localhost' || parsed.hostname.endsWith('.local')) {
    throw new ExtractionError(`Blocked hostname: ${parsed.hostname}`, rawUrl);
  }
  if ((isIpv4(parsed.hostname) || isIpv6(parsed.hostname)) && isPrivateIp(parsed.hostname)) {
    throw new ExtractionError(`Blocked IP address: ${parsed.hostname}`, rawUrl);
  }
  return parsed;
};

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const findMetaContent = (html: string, key: string): string | null => {
  const metaRe = new RegExp(`<meta[^>]+(?:property|name|itemprop)=["']${escapeRegExp(key)}["'][^>]*>`, 'i');
  const match = html.match(metaRe);
  if (!match) return null;
  const contentMatch = match[0].match(/content=["']([^"']*)["']/i);
  return contentMatch ? decodeEntities(contentMatch[1]).trim() || null : null;
};

const stripTags = (html: string): string =>
  html
    .replace(/<script[\s\S]*?<\/script>/gi, ' ')
    .replace(/<style[\s\S]*?<\/style>/gi, ' ')
    .replace(/<noscript[\s\S]*?<\/noscript>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<[^>]+>/g, ' ');

const fromCodePoint = (code: number): string =>
  Number.isInteger(code) && code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : '';

export const decodeEntities = (text: string): string =>
  text
    .replace(/&nbsp;/g, ' ')
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&#(\d+);/g, (_match, num: string) => fromCodePoint(Number(num)))
    .replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) => fromCodePoint(Number.parseInt(hex, 16)))
    .replace(/&amp;/g, '&');

const extractTagBlock = (html: string, tag: string): string | null => {
  const match = html.match(new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${tag}>`, 'i'));
  return match ? match[1] : null;
};

const htmlToText = (html: string): string => normalizeWhitespace(decodeEntities(stripTags(html)));

const extractTitle = (html: string): string | null => {
  const ogTitle = findMetaContent(html, 'og:title');
  if (ogTitle) return ogTitle;
  const titleMatch = html.match(/<title[^>]*>([^<]+)<\/title>/i);
  const title = titleMatch ? normalizeWhitespace(decodeEntities(titleMatch[1])) : '';
  return title || null;
};

const extractAuthor = (html: string): string | null => {
  for (const key of ['author', 'article:author']) {
    const author = findMetaContent(html, key);
    if (author && author.length <= MAX_AUTHOR_LENGTH) return author;
  }
  return null;
};

const extractKeywords = (html: string): string[] => {
  const raw = findMetaContent(html, 'keywords');
  return raw ? uniqueStrings(raw.split(','), MAX_KEYWORDS) : [];
};

const extractCanonicalLink = (html: string, base: string): string | null => {
  const match = html.match(/<link[^>]+rel=["']canonical["'][^>]+href=["']([^"']+)["'][^>]*>/i);
  if (!match) return null;
  try {
    return new URL(decodeEntities(match[1]), base).toString();
  } catch {
    return null;
  }
};

/** Pulls title, main text and provenance out of an HTML document. */
export const extractFromHtml = (html: string, pageUrl: string): Omit<ExtractedContent, 'originalLink'> & { canonical: string | null } => {
  const block = extractTagBlock(html, 'article') ?? extractTagBlock(html, 'main') ?? extractTagBlock(html, 'body');
  let text = block ? htmlToText(block) : '';
  if (!text) {
    text = htmlToText(html);
  }
  return {
    title: extractTitle(html),
    text,
    source: new URL(pageUrl).origin,
    author: extractAuthor(html),
    keywords: extractKeywords(html),
    canonical: extractCanonicalLink(html, pageUrl),
  };
};

const fetchWithTimeout = async (url: string, settings: ExtractionSettings, signal?: AbortSignal) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), settings.fetchTimeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    return await fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': settings.userAgent,
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-US,en;q=0.9,ru;q=0.8',
      },
      redirect: 'follow',
      signal: controller.signal,
    });
  } catch (error) {
    const reason = controller.signal.aborted && !signal?.aborted ? `timed out after ${settings.fetchTimeoutMs}ms` : errorMessage(error);
    throw new ExtractionError(`Fetch failed: ${reason}`, url, { cause: error });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
};

export const createTextExtractor = (settings: ExtractionSettings): TextExtractor => ({
  extractFromUrl: async (rawUrl, options = {}) => {
    const url = parseAllowedUrl(rawUrl).toString();
    const response = await fetchWithTimeout(url, settings, options.signal);

    if (!response.ok) {
      throw new ExtractionError(`HTTP ${response.status}`, url);
    }

    const contentType = response.headers.get('content-type') || '';
    if (!/text\/html|application\/xhtml\+xml/i.test(contentType)) {
      throw new ExtractionError(`Unsupported content-type: ${contentType || 'unknown'}`, url);
    }

    let html: string;
    try {
      html = await response.text();
    } catch (error) {
      throw new ExtractionError(`Failed to read response body: ${errorMessage(error)}`, url, { cause: error });
    }

    const finalUrl = response.url || url;
    const { canonical, ...content } = extractFromHtml(html, finalUrl);

    if (content.text.length < settings.minTextLength) {
      throw new ExtractionError(
        `Extracted text too short (${content.text.length} < ${settings.minTextLength} characters)`,
        url,
      );
    }

    return { ...content, originalLink: canonical ?? finalUrl };
  },
});
