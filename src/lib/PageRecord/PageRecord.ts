import { Schema } from 'effect';

export const DEFAULT_TITLE = 'No Title';

/**
 * Structured summary of one fetched page. Produced once, never mutated.
 */
export const PageRecordSchema = Schema.Struct({
  url: Schema.String.pipe(
    Schema.filter((s) => URL.canParse(s), {
      message: () => 'Invalid URL format',
    })
  ),
  /** First `<title>`, trimmed; `"No Title"` when absent */
  title: Schema.String,
  /** `<meta name="description">` content; empty when absent */
  description: Schema.String,
  /** Normalized, crawl-eligible, deduplicated outbound links in document order */
  outboundLinks: Schema.Array(Schema.String),
});

export type PageRecord = Schema.Schema.Type<typeof PageRecordSchema>;
