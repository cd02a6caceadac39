import axios from 'axios';
import { newsConfig, type NewsSummaryConfig } from './news-config';
import { NewsArticleSchema, NewsListingSchema, type NewsArticle } from './news-article.interface';
import { describeError, fail, succeed, type Outcome } from '@/lib/utils';

/**
 * Fetches the latest headlines from the Mediastack news API.
 *
 * A single request is made, without retries. Network, HTTP and payload
 * errors are logged and returned as a failed outcome.
 *
 * @returns The articles found under the response's `data` field.
 */
export async function fetchNews(
  config: Pick<NewsSummaryConfig, 'mediastackUrl' | 'mediastackApiKey' | 'countries'> = newsConfig,
): Promise<Outcome<NewsArticle[]>> {
  try {
    console.info(`Fetching news from ${config.mediastackUrl} (countries: ${config.countries})`);
    const response = await axios.get<unknown>(config.mediastackUrl, {
      params: {
        access_key: config.mediastackApiKey,
        countries: config.countries,
      },
    });

    const parsed = NewsListingSchema.safeParse(response.data);
    if (!parsed.success) {
      const message = `Unexpected news response shape: ${parsed.error.issues[0]?.message ?? 'invalid payload'}`;
      console.error('Error fetching news:', { error: message });
      return fail(message);
    }

    const articles: NewsArticle[] = [];
    (parsed.data.data ?? []).forEach((item, index) => {
      const article = NewsArticleSchema.safeParse(item);
      if (article.success) {
        articles.push(article.data);
      } else {
        console.warn(`Skipping malformed article at index ${index}:`, {
          error: article.error.issues[0]?.message ?? 'invalid article',
        });
      }
    });
    console.info(`Fetched ${articles.length} articles.`);
    return succeed(articles);
  } catch (error) {
    const message = describeError(error);
    console.error('Error fetching news:', { error: message });
    return fail(message);
  }
}
