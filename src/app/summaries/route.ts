// src/app/summaries/route.ts
import { extractContent } from '@/services/content-extractor';
import { fetchNews } from '@/services/news-fetcher';
import { newsConfig } from '@/services/news-config';
import { SummariesCache } from '@/services/summaries-cache';
import { createSummariesHandler } from '@/services/summaries-endpoint';
import { summarizeContent } from '@/services/summarizer';

// Responses are cached in process by SummariesCache, never prerendered.
export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

const summariesCache = new SummariesCache(newsConfig.cacheTtlSeconds * 1000);

export const GET = createSummariesHandler({
  cache: summariesCache,
  fetchNews: () => fetchNews(),
  extractContent,
  summarizeContent: (content) => summarizeContent(content),
});
