// Page fetch tests
import { createServer, type Server } from 'http';
import { gzipSync } from 'zlib';
import { Agent, MockAgent } from 'undici';
import { classifyNetworkError, fetchPage } from './http';
import { BROWSER_USER_AGENT } from './user-agents';

function networkError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('fetchPage', () => {
  let mockAgent: MockAgent;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  it('should fetch a page with browser headers', async () => {
    mockAgent
      .get('https://example.com')
      .intercept({
        path: '/show',
        method: 'GET',
        headers: { 'user-agent': BROWSER_USER_AGENT, referer: 'https://example.com/show' },
      })
      .reply(200, '<html><body>Episode</body></html>', { headers: { 'content-type': 'text/html' } });

    const page = await fetchPage({
      url: 'https://example.com/show',
      referer: 'https://example.com/show',
      dispatcher: mockAgent,
    });

    expect(page.status).toBe(200);
    expect(page.contentType).toBe('text/html');
    expect(page.body).toBe('<html><body>Episode</body></html>');
    expect(page.errorCode).toBeNull();
    expect(page.errorDetail).toBeNull();
  });

  it('should decode gzip bodies', async () => {
    mockAgent
      .get('https://example.com')
      .intercept({ path: '/zipped', method: 'GET' })
      .reply(200, gzipSync(Buffer.from('<p>compressed</p>')), { headers: { 'content-encoding': 'gzip' } });

    const page = await fetchPage({ url: 'https://example.com/zipped', dispatcher: mockAgent });

    expect(page.body).toBe('<p>compressed</p>');
  });

  it('should keep the raw body when decoding fails', async () => {
    mockAgent
      .get('https://example.com')
      .intercept({ path: '/mislabelled', method: 'GET' })
      .reply(200, 'plain text', { headers: { 'content-encoding': 'gzip' } });

    const page = await fetchPage({ url: 'https://example.com/mislabelled', dispatcher: mockAgent });

    expect(page.body).toBe('plain text');
  });

  it('should flag client errors and keep the body', async () => {
    mockAgent
      .get('https://example.com')
      .intercept({ path: '/missing', method: 'GET' })
      .reply(404, 'not here');

    const page = await fetchPage({ url: 'https://example.com/missing', dispatcher: mockAgent });

    expect(page.status).toBe(404);
    expect(page.body).toBe('not here');
    expect(page.errorCode).toBe('FETCH_HTTP_4XX');
    expect(page.errorDetail).toBe('HTTP 404');
  });

  it('should flag server errors', async () => {
    mockAgent
      .get('https://example.com')
      .intercept({ path: '/broken', method: 'GET' })
      .reply(503, 'unavailable');

    const page = await fetchPage({ url: 'https://example.com/broken', dispatcher: mockAgent });

    expect(page.errorCode).toBe('FETCH_HTTP_5XX');
  });

  it('should turn a refused connection into a response without status', async () => {
    mockAgent
      .get('https://unreachable.test')
      .intercept({ path: '/', method: 'GET' })
      .replyWithError(networkError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:443'));

    const page = await fetchPage({ url: 'https://unreachable.test/', dispatcher: mockAgent });

    expect(page.status).toBeNull();
    expect(page.body).toBeNull();
    expect(page.errorCode).toBe('FETCH_CONNECTION');
    expect(page.errorDetail).toBe('Connection failed (ECONNREFUSED): connect ECONNREFUSED 127.0.0.1:443');
  });

  it('should report DNS failures', async () => {
    mockAgent
      .get('https://no-such-host.test')
      .intercept({ path: '/', method: 'GET' })
      .replyWithError(networkError('ENOTFOUND', 'getaddrinfo ENOTFOUND no-such-host.test'));

    const page = await fetchPage({ url: 'https://no-such-host.test/', dispatcher: mockAgent });

    expect(page.errorCode).toBe('FETCH_DNS');
  });
});

describe('fetchPage against a local server', () => {
  let server: Server;
  let agent: Agent;
  let baseUrl: string;

  beforeEach(async () => {
    server = createServer((req, res) => {
      if (req.url === '/trickle') {
        res.writeHead(200, { 'content-type': 'text/html' });
        const timer = setInterval(() => res.write('<p>.</p>'), 50);
        res.on('close', () => clearInterval(timer));
      }
      // Any other path is accepted and never answered
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
    agent = new Agent();
  });

  afterEach(async () => {
    await agent.destroy();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should give up when the total time runs out while the body keeps arriving', async () => {
    const page = await fetchPage({ url: `${baseUrl}/trickle`, timeoutMs: 300, dispatcher: agent });

    expect(page.status).toBeNull();
    expect(page.body).toBeNull();
    expect(page.errorCode).toBe('FETCH_TIMEOUT');
    expect(page.errorDetail).toBe('No response within 300ms');
    expect(page.elapsedMs).toBeLessThan(2000);
  });

  it('should stop as soon as the caller aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    const page = await fetchPage({ url: `${baseUrl}/hang`, dispatcher: agent, signal: controller.signal });

    expect(page.status).toBeNull();
    expect(page.errorCode).toBe('UNKNOWN');
    expect(page.errorDetail).toBe('Request aborted');
    expect(page.elapsedMs).toBeLessThan(2000);
  });
});

describe('classifyNetworkError', () => {
  it('should classify undici timeouts', () => {
    const failure = classifyNetworkError(networkError('UND_ERR_HEADERS_TIMEOUT', 'Headers Timeout Error'), 30000);
    expect(failure).toEqual({ errorCode: 'FETCH_TIMEOUT', errorDetail: 'No response within 30000ms' });
  });

  it('should classify certificate errors', () => {
    const failure = classifyNetworkError(networkError('CERT_HAS_EXPIRED', 'certificate has expired'), 1000);
    expect(failure.errorCode).toBe('FETCH_TLS');
  });

  it('should fall back to a connection error for values without a code', () => {
    const failure = classifyNetworkError('boom', 1000);
    expect(failure).toEqual({ errorCode: 'FETCH_CONNECTION', errorDetail: 'Connection failed: boom' });
  });
});
