import { MockAgent } from 'undici';
import type { StreamTarget } from '@streamcast/shared';
import { StaticPageExtractor, findMediaReference } from './static';

const PAGE = 'https://example.com/show';

describe('findMediaReference', () => {
  it('should resolve a relative <video src> against the page URL', () => {
    const html = '<html><body><video src="/media/ep1.mp4"></video></body></html>';

    expect(findMediaReference(html, PAGE)).toEqual({
      url: 'https://example.com/media/ep1.mp4',
      source: 'video',
    });
  });

  it('should fall back to a nested <source> element', () => {
    const html = '<video controls><source src="clips/intro.webm" type="video/webm"></video>';

    expect(findMediaReference(html, 'https://example.com/shows/today')).toEqual({
      url: 'https://example.com/shows/clips/intro.webm',
      source: 'video',
    });
  });

  it('should return a player iframe src unchanged', () => {
    const html = `
      <iframe src="https://ads.example.net/banner"></iframe>
      <iframe src="https://host/embed/123"></iframe>
      <iframe src="https://host/player/456"></iframe>`;

    expect(findMediaReference(html, PAGE)).toEqual({ url: 'https://host/embed/123', source: 'iframe' });
  });

  it('should match iframe hints case-insensitively', () => {
    const html = '<iframe src="https://cdn.example.net/LiveStream?id=9"></iframe>';

    expect(findMediaReference(html, PAGE)?.url).toBe('https://cdn.example.net/LiveStream?id=9');
  });

  it('should prefer the video element over iframes', () => {
    const html = '<iframe src="https://host/embed/1"></iframe><video src="https://cdn.example.net/a.mp4"></video>';

    expect(findMediaReference(html, PAGE)?.source).toBe('video');
  });

  it('should find an m3u8 URL in script text', () => {
    const html = `<script>
      var config = { autoplay: true };
      player.load("https://cdn.example.net/live/index.m3u8?token=abc");
    </script>`;

    expect(findMediaReference(html, PAGE)).toEqual({
      url: 'https://cdn.example.net/live/index.m3u8?token=abc',
      source: 'script-m3u8',
    });
  });

  it('should find a file assignment in script text', () => {
    const html = '<script>jwplayer("p").setup({ file: "https://cdn/x.m3u8" });</script>';

    expect(findMediaReference(html, PAGE)?.url).toBe('https://cdn/x.m3u8');
  });

  it('should resolve a relative assigned URL', () => {
    const html = "<script>var SOURCE = '/vod/episode-2.mp4';</script>";

    expect(findMediaReference(html, PAGE)).toEqual({
      url: 'https://example.com/vod/episode-2.mp4',
      source: 'script-assignment',
    });
  });

  it('should check scripts in document order', () => {
    const html = `
      <script>var src = "/first.mp4";</script>
      <script>var hls = "https://cdn.example.net/second.m3u8";</script>`;

    expect(findMediaReference(html, PAGE)?.url).toBe('https://example.com/first.mp4');
  });

  it('should return null when nothing matches', () => {
    const html = '<html><body><p>No stream today</p><iframe src="https://ads.example.net/banner"></iframe></body></html>';

    expect(findMediaReference(html, PAGE)).toBeNull();
  });
});

describe('StaticPageExtractor', () => {
  const target: StreamTarget = { url: PAGE, popupSelectors: [], videoSelectors: [] };
  let mockAgent: MockAgent;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  it('should resolve a video URL from the fetched page', async () => {
    mockAgent
      .get('https://example.com')
      .intercept({ path: '/show', method: 'GET' })
      .reply(200, '<video src="/media/ep1.mp4"></video>', { headers: { 'content-type': 'text/html' } });

    const extractor = new StaticPageExtractor(target, { dispatcher: mockAgent });
    const result = await extractor.extract();
    await extractor.close();

    expect(result).toEqual({
      resolvedUrl: 'https://example.com/media/ep1.mp4',
      diagnostic: 'Matched video',
      errorCode: null,
      method: 'static',
    });
  });

  it('should send the page URL as referer', async () => {
    mockAgent
      .get('https://example.com')
      .intercept({ path: '/show', method: 'GET', headers: { referer: PAGE } })
      .reply(200, '<video src="https://cdn.example.net/a.mp4"></video>');

    const extractor = new StaticPageExtractor(target, { dispatcher: mockAgent });

    await expect(extractor.getVideoUrl()).resolves.toBe('https://cdn.example.net/a.mp4');
  });

  it('should fail on a non-200 status', async () => {
    mockAgent
      .get('https://example.com')
      .intercept({ path: '/show', method: 'GET' })
      .reply(404, '<video src="/never.mp4"></video>');

    const extractor = new StaticPageExtractor(target, { dispatcher: mockAgent });
    const result = await extractor.extract();

    expect(result.resolvedUrl).toBeNull();
    expect(result.errorCode).toBe('FETCH_HTTP_4XX');
  });

  it('should report a page without media as no match', async () => {
    mockAgent
      .get('https://example.com')
      .intercept({ path: '/show', method: 'GET' })
      .reply(200, '<p>Off air</p>');

    const extractor = new StaticPageExtractor(target, { dispatcher: mockAgent });
    const result = await extractor.extract();

    expect(result.resolvedUrl).toBeNull();
    expect(result.errorCode).toBe('EXTRACT_NO_MATCH');
  });

  it('should return null instead of throwing when the host refuses connections', async () => {
    mockAgent
      .get('https://example.com')
      .intercept({ path: '/show', method: 'GET' })
      .replyWithError(Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' }));

    const extractor = new StaticPageExtractor(target, { dispatcher: mockAgent, timeoutMs: 1000 });
    const result = await extractor.extract();

    expect(result.resolvedUrl).toBeNull();
    expect(result.errorCode).toBe('FETCH_CONNECTION');
  });

  it('should close safely without having fetched anything', async () => {
    const extractor = new StaticPageExtractor(target);

    await expect(extractor.close()).resolves.toBeUndefined();
    await expect(extractor.close()).resolves.toBeUndefined();
  });
});
