import { NextResponse } from 'next/server';
import { aggregateSummaries, type SummarizeDependencies } from '@/actions/summarize-actions';
import type { NewsArticle } from './news-article.interface';
import type { SummariesCache } from './summaries-cache';
import { describeError, type Outcome } from '@/lib/utils';

export const NO_ARTICLES_MESSAGE = 'No articles found.';

export interface SummariesEndpointDependencies extends SummarizeDependencies {
  cache: SummariesCache;
  fetchNews: () => Promise<Outcome<NewsArticle[]>>;
}

/**
 * Builds the GET handler for the summaries route.
 *
 * A fresh cache entry is returned as-is. Otherwise the news listing is
 * fetched and summarized, and the result replaces the cache entry. When no
 * articles are available the cache keeps its previous state.
 */
export function createSummariesHandler(deps: SummariesEndpointDependencies) {
  return async function GET(): Promise<NextResponse> {
    try {
      const cached = deps.cache.read();
      if (cached !== null) {
        console.info(`Serving ${cached.length} cached summaries.`);
        return NextResponse.json(cached);
      }

      const news = await deps.fetchNews();
      if (!news.success || news.data.length === 0) {
        console.warn('No articles available from the news API.');
        return NextResponse.json({ message: NO_ARTICLES_MESSAGE }, { status: 404 });
      }

      const records = await aggregateSummaries(news.data, deps);
      deps.cache.store(records);
      return NextResponse.json(records);
    } catch (error) {
      console.error('Error in summaries API route:', { error: describeError(error) });
      return NextResponse.json({ message: 'Failed to build summaries.' }, { status: 500 });
    }
  };
}
