import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { BROWSER_USER_AGENT, extractContent, extractText } from '../src/services/content-extractor';
import { HttpResponse, http, server } from './msw-server';

const ARTICLE_URL = 'http://articles.test/world/heavy-rain-expected';

const articleHtml = `<!doctype html>
<html>
  <head>
    <title>Rain forecast</title>
    <style>body { color: red; }</style>
    <script>window.tracker = "ignored";</script>
  </head>
  <body>
    <h1>Heavy   rain expected</h1>

    <p>The weather office issued an alert.</p>
    <p>Read more at <a href="/other">this link</a> today.</p>
  </body>
</html>`;

describe('extractText', () => {
  it('drops scripts, styles and link text and collapses whitespace', () => {
    expect(extractText(articleHtml)).toBe(
      'Rain forecast Heavy rain expected The weather office issued an alert. Read more at today.',
    );
  });

  it('returns an empty string for a page without text', () => {
    expect(extractText('<html><body><script>1</script>\n\n</body></html>')).toBe('');
  });
});

describe('extractContent', () => {
  beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
  afterEach(() => {
    server.resetHandlers();
    vi.restoreAllMocks();
  });
  afterAll(() => server.close());

  it('sends a browser user agent and returns the page text', async () => {
    let userAgent: string | null = null;
    server.use(
      http.get(ARTICLE_URL, ({ request }) => {
        userAgent = request.headers.get('user-agent');
        return HttpResponse.html('<html><body><p>Markets   closed higher.</p></body></html>');
      }),
    );

    const result = await extractContent(ARTICLE_URL);

    expect(result).toEqual({ success: true, data: 'Markets closed higher.' });
    expect(userAgent).toBe(BROWSER_USER_AGENT);
  });

  it('returns a failure for a non-2xx response', async () => {
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});
    server.use(http.get(ARTICLE_URL, () => new HttpResponse('gone', { status: 404 })));

    const result = await extractContent(ARTICLE_URL);

    expect(result.success).toBe(false);
    expect(errorLog).toHaveBeenCalledOnce();
  });

  it('returns a failure when the request cannot be made', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    server.use(http.get(ARTICLE_URL, () => HttpResponse.error()));

    const result = await extractContent(ARTICLE_URL);

    expect(result.success).toBe(false);
  });
});
