import { readFileSync } from 'node:fs';
import { Schema } from 'effect';
import { CRAWLER_DEFAULTS } from '../Crawler/Crawler.defaults.js';

const IgnoredExtensionsSchema = Schema.Struct({
  archives: Schema.Array(Schema.String),
  images: Schema.Array(Schema.String),
  audio: Schema.Array(Schema.String),
  video: Schema.Array(Schema.String),
  documents: Schema.Array(Schema.String),
  other: Schema.Array(Schema.String),
});

/**
 * Non-HTML file extensions grouped by category, loaded from
 * `data/ignored-extensions.json`.
 */
export const IGNORED_EXTENSIONS: Schema.Schema.Type<
  typeof IgnoredExtensionsSchema
> = Schema.decodeUnknownSync(Schema.parseJson(IgnoredExtensionsSchema))(
  readFileSync(
    new URL('../../../data/ignored-extensions.json', import.meta.url),
    'utf-8'
  )
);

const ALLOWED_PROTOCOLS: ReadonlySet<string> = new Set(['http:', 'https:']);

const extensionCategories = Object.entries(IGNORED_EXTENSIONS).flatMap(
  ([category, extensions]) =>
    extensions.map((ext) => ({
      category,
      ext: ext.toLowerCase(),
    }))
);

/**
 * Outcome of normalizing a discovered link.
 *
 * `url` is the fragment-free absolute form when the href could be resolved,
 * otherwise the raw href.
 */
export interface NormalizedLink {
  readonly valid: boolean;
  readonly url: string;
  readonly reason?: string;
}

const parse = (input: string, base?: string): URL | null => {
  try {
    return new URL(input, base);
  } catch {
    return null;
  }
};

/**
 * Returns the canonical form of an absolute URL: WHATWG serialization with the
 * fragment removed. Unparsable input is returned unchanged.
 */
export const normalizeUrl = (url: string): string => {
  const parsed = parse(url);
  if (!parsed) return url;
  parsed.hash = '';
  return parsed.href;
};

/**
 * Explains why a URL is not crawlable, or returns undefined when it is.
 */
export const rejectionReason = (url: string): string | undefined => {
  if (url.length > CRAWLER_DEFAULTS.MAX_URL_LENGTH) {
    return `URL length ${url.length} exceeds maximum ${CRAWLER_DEFAULTS.MAX_URL_LENGTH}`;
  }

  const parsed = parse(url);
  if (!parsed) return 'Malformed URL';

  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    return `Protocol ${parsed.protocol} is not crawlable`;
  }

  const pathname = parsed.pathname.toLowerCase();
  const match = extensionCategories.find(({ ext }) => pathname.endsWith(ext));
  if (match) {
    return `Filtered ${match.category} file extension ${match.ext}`;
  }

  return undefined;
};

export const isValidUrl = (url: string): boolean =>
  rejectionReason(url) === undefined;

/**
 * Resolves `href` against `baseUrl`, drops the fragment and decides whether
 * the result may be crawled. Never throws.
 *
 * @example
 * ```typescript
 * normalizeLink('https://site.com/docs/', '../about#team');
 * // { valid: true, url: 'https://site.com/about' }
 * ```
 */
export const normalizeLink = (
  baseUrl: string,
  href: string | undefined | null
): NormalizedLink => {
  const raw = (href ?? '').trim();
  if (!raw) return { valid: false, url: raw, reason: 'Empty href' };

  const resolved = parse(raw, baseUrl);
  if (!resolved) return { valid: false, url: raw, reason: 'Malformed URL' };

  resolved.hash = '';
  const url = resolved.href;
  const reason = rejectionReason(url);
  return reason ? { valid: false, url, reason } : { valid: true, url };
};

/**
 * Politeness key of a URL: hostname plus any non-default port.
 */
export const domainOf = (url: string): string => parse(url)?.host ?? url;
