import { z } from 'genkit';

/**
 * A news article as listed by the Mediastack API.
 * Every field may be missing or null; unknown fields are ignored.
 */
export const NewsArticleSchema = z.object({
  title: z.string().nullish().describe('Headline of the article.'),
  source: z.string().nullish().describe('Name of the publishing outlet.'),
  url: z.string().nullish().describe('Canonical URL of the article page.'),
  published_at: z.string().nullish().describe('Publication timestamp as sent by the API.'),
});
export type NewsArticle = z.infer<typeof NewsArticleSchema>;

/**
 * The listing envelope. Items are validated one by one so a single
 * malformed entry does not discard the rest.
 */
export const NewsListingSchema = z.object({
  data: z.array(z.unknown()).optional(),
});

/**
 * One entry of the summaries response.
 */
export interface SummaryRecord {
  /**
   * Article metadata, copied from the listing. `"N/A"` when the listing
   * omitted the field, `null` when it sent null.
   */
  title: string | null;
  source: string | null;
  url: string | null;
  published: string | null;
  /**
   * The generated summary. Null whenever `error` is set.
   */
  summary: string | null;
  /**
   * Why no summary was produced for this article.
   */
  error: string | null;
}
