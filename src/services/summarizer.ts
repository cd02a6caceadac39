import { summarizeArticle } from '@/ai/flows/summarize-article';
import { newsConfig } from './news-config';
import { describeError, fail, succeed, type Outcome } from '@/lib/utils';

/**
 * Asks the model for a short summary of an article's text.
 * Model or transport errors are logged and returned as a failed outcome.
 */
export async function summarizeContent(
  content: string,
  wordLimit: number = newsConfig.summaryWordLimit,
): Promise<Outcome<string>> {
  const started = Date.now();
  try {
    const { summary } = await summarizeArticle({ content, wordLimit });
    console.info(`Generated summary (${summary.length} characters) in ${Date.now() - started}ms`);
    return succeed(summary);
  } catch (error) {
    const message = describeError(error);
    console.error('Error generating summary:', { error: message });
    return fail(message);
  }
}
