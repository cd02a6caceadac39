import axios from 'axios';
import * as cheerio from 'cheerio';
import { cleanContent, describeError, fail, succeed, type Outcome } from '@/lib/utils';

// Some sites reject requests without a browser user agent.
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

// Elements whose text is not part of the article body.
const DISCARDED_ELEMENTS = 'script, style, a';

/**
 * Extracts the visible text of an HTML document, without scripts, styles
 * and link text, with whitespace collapsed to single spaces.
 */
export function extractText(html: string): string {
  const $ = cheerio.load(html);
  $(DISCARDED_ELEMENTS).remove();
  return cleanContent($.root().text());
}

/**
 * Downloads an article page and returns its plain text.
 * The text is not truncated. An empty page yields an empty string.
 */
export async function extractContent(url: string): Promise<Outcome<string>> {
  try {
    const response = await axios.get<string>(url, {
      headers: { 'User-Agent': BROWSER_USER_AGENT },
      responseType: 'text',
    });
    const text = extractText(response.data);
    console.info(`Extracted ${text.length} characters from ${url}`);
    return succeed(text);
  } catch (error) {
    const message = describeError(error);
    console.error('Error extracting content:', { url, error: message });
    return fail(message);
  }
}
