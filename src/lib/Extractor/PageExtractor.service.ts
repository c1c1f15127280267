import { Effect, Schema } from 'effect';
import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { DEFAULT_TITLE, PageRecordSchema, type PageRecord } from '../PageRecord/PageRecord.js';
import { normalizeLink } from '../UrlFilter/UrlFilter.js';

/**
 * Pulls title, description and outbound links out of an HTML document.
 * Pure: no I/O, and malformed input degrades to a partial record.
 */
export const extractPageRecord = (html: string, baseUrl: string): PageRecord => {
  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch {
    return { url: baseUrl, title: DEFAULT_TITLE, description: '', outboundLinks: [] };
  }

  const title = $('title').first().text().trim() || DEFAULT_TITLE;

  const descriptionMeta = $('meta')
    .filter((_, element: Element) => ($(element).attr('name') ?? '').toLowerCase() === 'description')
    .first();
  const description = (descriptionMeta.attr('content') ?? '').trim();

  const outboundLinks = new Set<string>();
  $('a[href]').each((_, element: Element) => {
    const link = normalizeLink(baseUrl, $(element).attr('href'));
    if (link.valid) {
      outboundLinks.add(link.url);
    }
  });

  return {
    url: baseUrl,
    title,
    description,
    outboundLinks: Array.from(outboundLinks),
  };
};

/**
 * Service wrapper around {@link extractPageRecord} that validates the record.
 *
 * @group Services
 * @public
 */
export class PageExtractorService extends Effect.Service<PageExtractorService>()(
  'crawlgraph/PageExtractorService',
  {
    succeed: {
      extract: (html: string, baseUrl: string): Effect.Effect<PageRecord> =>
        Effect.sync(() => extractPageRecord(html, baseUrl)).pipe(
          Effect.flatMap(Schema.validate(PageRecordSchema)),
          Effect.orDie
        ),
    },
  }
) {}
