import { NewsService } from './news';
import { NO_NEWS, NewsItem, NewsProvider } from '../types/news';
import { TRACKED_INSTRUMENTS } from '../types/instrument';
import { GNewsAdapter, NewsApiAdapter } from '../adapters/news';
import { FetchSpy, stubFetch } from '../test/http';

const [bitcoin] = TRACKED_INSTRUMENTS;

type MockNewsProvider = NewsProvider & { searchNews: jest.Mock };

function newsProvider(providerName: string, configured: boolean, result: NewsItem[] | Error): MockNewsProvider {
  return {
    providerName,
    isConfigured: () => configured,
    searchNews: jest.fn(async () => {
      if (result instanceof Error) throw result;
      return result;
    })
  };
}

const item = (title: string): NewsItem => ({ title, source: 'CoinDesk', url: `https://example.com/${title}` });

describe('NewsService', () => {
  let fetchMock: FetchSpy;

  beforeEach(() => {
    fetchMock = stubFetch();
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('should return the sentinel without any request when no key is configured', async () => {
    const service = new NewsService({
      providers: [
        new NewsApiAdapter({ apiEndpoint: 'https://newsapi.test/v2', timeoutMs: 1000 }),
        new GNewsAdapter({ apiEndpoint: 'https://gnews.test/api/v4', apiKey: '', timeoutMs: 1000 })
      ]
    });

    expect(service.hasConfiguredProvider()).toBe(false);
    await expect(service.fetchNews(bitcoin)).resolves.toBe(NO_NEWS);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should fall through to the secondary provider when the primary finds nothing', async () => {
    const primary = newsProvider('primary', true, []);
    const secondary = newsProvider('secondary', true, [item('etf-flows')]);
    const service = new NewsService({ providers: [primary, secondary] });

    await expect(service.fetchNews(bitcoin, 3)).resolves.toEqual({
      kind: 'items',
      provider: 'secondary',
      items: [item('etf-flows')]
    });
    expect(primary.searchNews).toHaveBeenCalledWith(bitcoin, 3, undefined);
  });

  it('should fall through when the primary fails', async () => {
    const service = new NewsService({
      providers: [newsProvider('primary', true, new Error('HTTP 401')), newsProvider('secondary', true, [item('a')])]
    });

    const digest = await service.fetchNews(bitcoin);
    expect(digest.kind === 'items' && digest.provider).toBe('secondary');
  });

  it('should skip unconfigured providers', async () => {
    const primary = newsProvider('primary', false, [item('a')]);
    const secondary = newsProvider('secondary', true, [item('b')]);
    const service = new NewsService({ providers: [primary, secondary] });

    await expect(service.fetchNews(bitcoin)).resolves.toEqual({
      kind: 'items',
      provider: 'secondary',
      items: [item('b')]
    });
    expect(primary.searchNews).not.toHaveBeenCalled();
  });

  it('should cap the number of items', async () => {
    const service = new NewsService({
      providers: [newsProvider('primary', true, [item('a'), item('b'), item('c'), item('d')])]
    });

    const digest = await service.fetchNews(bitcoin, 2);
    expect(digest).toEqual({ kind: 'items', provider: 'primary', items: [item('a'), item('b')] });
  });

  it('should return the sentinel when every provider comes back empty', async () => {
    const service = new NewsService({
      providers: [newsProvider('primary', true, []), newsProvider('secondary', true, new Error('down'))]
    });

    await expect(service.fetchNews(bitcoin)).resolves.toBe(NO_NEWS);
  });
});
