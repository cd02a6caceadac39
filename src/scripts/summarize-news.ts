/**
 * One-shot console run of the summaries pipeline.
 *
 * Usage: npm run summarize
 */
import 'dotenv/config';
import { aggregateSummaries, formatArticle } from '@/actions/summarize-actions';
import { extractContent } from '@/services/content-extractor';
import { fetchNews } from '@/services/news-fetcher';
import { summarizeContent } from '@/services/summarizer';

const SEPARATOR = '='.repeat(50);

async function main(): Promise<void> {
  console.log('Fetching news articles...');
  const news = await fetchNews();
  if (!news.success || news.data.length === 0) {
    console.log('No articles found.');
    return;
  }

  const records = await aggregateSummaries(news.data, {
    extractContent,
    summarizeContent: (content) => summarizeContent(content),
  });

  news.data.forEach((article, index) => {
    const record = records[index];
    console.log(`\n${SEPARATOR}`);
    console.log(formatArticle(article));
    console.log(record.summary !== null ? `Summary: ${record.summary}` : record.error);
  });
}

main().catch((error: unknown) => {
  console.error('Summarize run failed:', error);
  process.exitCode = 1;
});
