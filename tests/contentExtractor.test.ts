import { FetchError, Response } from 'node-fetch';
import { HtmlContentExtractor } from '../src/infrastructure/extraction/HtmlContentExtractor.js';
import { ExtractionError } from '../src/core/errors/ResearchErrors.js';
import { fakeFetch, htmlResponse, silentLogger } from './helpers/fakes.js';

const config = {
  timeoutMs: 8000,
  maxExtractionSize: 1_000_000,
  maxContentLength: 2000,
  maxParagraphs: 5,
  userAgent: 'test-agent',
};

const URL = 'https://oceans.example.org/currents';

const P2 = 'Ocean currents carry warm water from the tropics toward the poles.';
const P3 = 'Cold water sinks near the poles and flows back along the ocean floor.';

const ARTICLE = `<html>
<head>
  <title>  Ocean   Currents </title>
  <meta name="description" content="How ocean currents move heat.">
  <script>window.banner = 'please enable javascript';</script>
</head>
<body>
  <p>Short.</p>
  <p>${P2}</p>
  <p>${P3}</p>
</body>
</html>`;

function extractorFor(response: () => Response | Promise<Response>, overrides: Partial<typeof config> = {}) {
  const fetch = fakeFetch(response);
  return { fetch, extractor: new HtmlContentExtractor({ ...config, ...overrides }, fetch, silentLogger) };
}

describe('HtmlContentExtractor', () => {
  test('should extract title, description and paragraphs', async () => {
    const { extractor, fetch } = extractorFor(() => htmlResponse(ARTICLE));

    const page = await extractor.extract(URL);

    expect(page.title).toBe('Ocean Currents');
    expect(page.description).toBe('How ocean currents move heat.');
    expect(page.content).toBe(`${P2}\n\n${P3}`);
    expect(page.url).toBe(URL);
    expect(page.extractedAt).toBeInstanceOf(Date);
    expect(fetch.inits[0]).toMatchObject({ timeout: 8000, size: 1_000_000 });
  });

  test('should pass the abort signal to the page request', async () => {
    const { extractor, fetch } = extractorFor(() => htmlResponse(ARTICLE));
    const controller = new AbortController();

    await extractor.extract(URL, controller.signal);

    expect(fetch.inits[0]?.signal).toBe(controller.signal);
  });

  test('should cut content at a paragraph break when one fits', async () => {
    const { extractor } = extractorFor(() => htmlResponse(ARTICLE), { maxContentLength: 120 });
    const page = await extractor.extract(URL);
    expect(page.content).toBe(`${P2}\n\n[Content truncated due to size limits]`);
  });

  test('should hard cut content with a marker otherwise', async () => {
    const { extractor } = extractorFor(() => htmlResponse(ARTICLE), { maxContentLength: 100 });
    const page = await extractor.extract(URL);
    expect(page.content).toBe(`${P2.slice(0, 58)}...\n[Content truncated due to size limits]`);
    expect(page.content).toHaveLength(100);
  });

  test('should fall back to headings when there are too few paragraphs', async () => {
    const html = `<html><body>
      <h1>Understanding Tidal Energy Systems</h1>
      <h2>How tidal turbines convert motion.</h2>
      <p>Tides rise and fall twice daily. Turbines capture this flow.</p>
    </body></html>`;
    const { extractor } = extractorFor(() => htmlResponse(html));

    const page = await extractor.extract(URL);

    expect(page.title).toBe('No title');
    expect(page.description).toBe('No description available');
    expect(page.content).toBe(
      'Understanding Tidal Energy Systems\n\nHow tidal turbines convert motion.\n\nTides rise and fall twice daily. Turbines capture this flow.'
    );
  });

  test('should accept plain text documents', async () => {
    const text =
      'Tidal power notes\n\nThis is the first paragraph of plain text content here.\n\nAnd this is a second paragraph with more words.';
    const { extractor } = extractorFor(() => htmlResponse(text, { contentType: 'text/plain' }));

    const page = await extractor.extract(URL);

    expect(page.title).toBe('Tidal power notes');
    expect(page.content).toBe(text);
  });

  test('should fail with FetchFailed on an HTTP error status', async () => {
    const { extractor } = extractorFor(() => new Response('', { status: 404, statusText: 'Not Found' }));
    const error = await extractor.extract(URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({ kind: 'FetchFailed', url: URL });
    expect(error).toHaveProperty('message', `Extraction error for ${URL}: HTTP 404 Not Found`);
  });

  test('should fail with Unsupported for binary content types', async () => {
    const { extractor } = extractorFor(() => htmlResponse('%PDF-1.7', { contentType: 'application/pdf' }));
    const error = await extractor.extract(URL).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: 'Unsupported', detail: 'unsupported content type application/pdf' });
  });

  test('should fail with TooLarge when the declared length exceeds the limit', async () => {
    const { extractor } = extractorFor(
      () =>
        new Response(ARTICLE, {
          status: 200,
          headers: { 'content-type': 'text/html', 'content-length': '5000000' },
        })
    );
    const error = await extractor.extract(URL).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: 'TooLarge', detail: 'document is 5000000 bytes, limit is 1000000' });
  });

  test('should fail with TooLarge when the body overruns the size limit', async () => {
    const { extractor } = extractorFor(() => Promise.reject(new FetchError('content size over limit', 'max-size')));
    const error = await extractor.extract(URL).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: 'TooLarge', detail: 'document exceeds 1000000 bytes' });
  });

  test('should fail with FetchFailed on a timeout', async () => {
    const { extractor } = extractorFor(() => Promise.reject(new FetchError('network timeout', 'request-timeout')));
    const error = await extractor.extract(URL).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: 'FetchFailed', detail: 'timed out after 8000ms' });
  });

  test('should reject access walls as low quality content', async () => {
    const html = `<html><head><title>Access Denied</title></head><body>
      <p>You do not have permission to view this document on this server.</p>
      <p>Please contact the site administrator if you believe this is wrong.</p>
    </body></html>`;
    const { extractor } = extractorFor(() => htmlResponse(html));
    const error = await extractor.extract(URL).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: 'Unsupported', detail: 'low quality or restricted content' });
  });
});
