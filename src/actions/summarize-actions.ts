import type { NewsArticle, SummaryRecord } from '@/services/news-article.interface';
import type { Outcome } from '@/lib/utils';

export const NO_URL_ERROR = 'No URL available for article.';
export const EXTRACTION_ERROR = 'Could not extract article content.';
export const SUMMARY_ERROR = 'Could not generate summary.';

const MISSING = 'N/A';

// --- Interfaces ---

export interface SummarizeDependencies {
  extractContent: (url: string) => Promise<Outcome<string>>;
  summarizeContent: (content: string) => Promise<Outcome<string>>;
}

// --- Utility Functions ---

/**
 * Copies a metadata field, using "N/A" only when the listing omitted it.
 */
const metadata = (value: string | null | undefined): string | null =>
  value === undefined ? MISSING : value;

const toRecord = (article: NewsArticle): SummaryRecord => ({
  title: metadata(article.title),
  source: metadata(article.source),
  url: metadata(article.url),
  published: metadata(article.published_at),
  summary: null,
  error: null,
});

/**
 * Renders an article's metadata as a plain-text block for console output.
 * Values follow the summary record: "N/A" when omitted, "null" when sent as null.
 */
export function formatArticle(article: NewsArticle): string {
  const record = toRecord(article);
  return [
    `Title: ${String(record.title)}`,
    `Source: ${String(record.source)}`,
    `URL: ${String(record.url)}`,
    `Published: ${String(record.published)}`,
  ].join('\n');
}

// --- Pipeline ---

/**
 * Summarizes a single article: extract its page text, then ask the model.
 * Empty text or an empty summary counts as a failure of that stage.
 */
export async function summarizeArticleRecord(
  article: NewsArticle,
  deps: SummarizeDependencies,
): Promise<SummaryRecord> {
  const record = toRecord(article);

  if (!article.url) {
    console.warn(`Skipping article without URL: "${article.title ?? MISSING}"`);
    return { ...record, error: NO_URL_ERROR };
  }

  const extracted = await deps.extractContent(article.url);
  if (!extracted.success || !extracted.data) {
    return { ...record, error: EXTRACTION_ERROR };
  }

  const summarized = await deps.summarizeContent(extracted.data);
  if (!summarized.success || !summarized.data) {
    return { ...record, error: SUMMARY_ERROR };
  }

  return { ...record, summary: summarized.data };
}

/**
 * Produces one summary record per article, in input order.
 *
 * Articles are processed one at a time; a failure on one article is
 * recorded on its entry and does not stop the batch.
 */
export async function aggregateSummaries(
  articles: readonly NewsArticle[],
  deps: SummarizeDependencies,
): Promise<SummaryRecord[]> {
  const startTime = Date.now();
  const records: SummaryRecord[] = [];

  console.info(`--- Starting aggregateSummaries --- Articles: ${articles.length}`);
  for (const article of articles) {
    records.push(await summarizeArticleRecord(article, deps));
  }

  const summarized = records.filter((record) => record.summary !== null).length;
  console.info(
    `--- Finished aggregateSummaries --- Summarized: ${summarized}/${records.length}, Duration: ${Date.now() - startTime}ms`,
  );
  return records;
}
