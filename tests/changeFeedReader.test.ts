import { FeedError } from '../harvester/errors';
import { BatchFetcher } from '../harvester/services/batchFetcher';
import {
  fetchFeedPage,
  isChangedSince,
  parseTimestamp,
  readOffsetFeed,
  readPagedFeed,
  readScrollFeed,
  rebatch,
  walkTree,
  type OffsetPage,
  type ScrollPage,
} from '../harvester/services/changeFeedReader';
import { ResolvedItemCache } from '../harvester/services/resolvedItemCache';
import { RetryingFetcher } from '../harvester/services/retryingFetcher';
import type { ItemReference } from '../harvester/types';
import { makeTextResponse, nodeAdapter, nodeRoutes, nodeUrl, noSleep, routeTransport, type TestNode } from './helpers';

const refs = (...ids: string[]): ItemReference[] => ids.map((id) => ({ id, url: `https://feed.test/${id}` }));

const collectIds = async (pages: AsyncIterable<ItemReference[]>): Promise<string[][]> => {
  const result: string[][] = [];
  for await (const page of pages) {
    result.push(page.map((ref) => ref.id));
  }
  return result;
};

describe('since filter', () => {
  const since = new Date('2024-03-01T00:00:00Z');

  it('excludes one second before the bound and includes the bound itself', () => {
    expect(isChangedSince({ modified: ['2024-02-29T23:59:59Z'] }, since)).toBe(false);
    expect(isChangedSince({ modified: ['2024-03-01T00:00:00Z'] }, since)).toBe(true);
  });

  it('reads timestamps without a zone as UTC', () => {
    expect(parseTimestamp('2024-03-01T00:00:00')).toBe(since.getTime());
    expect(isChangedSince({ modified: ['2024-03-01T00:00:00'] }, since)).toBe(true);
    expect(isChangedSince({ modified: ['2024-03-01T01:00:00+02:00'] }, since)).toBe(false);
  });

  it('uses the latest modification and falls back to creation', () => {
    expect(isChangedSince({ modified: ['2023-01-01T00:00:00Z', '2024-05-01T00:00:00Z'] }, since)).toBe(true);
    expect(isChangedSince({ modified: [], created: ['2024-04-01T00:00:00Z'] }, since)).toBe(true);
    expect(isChangedSince({ modified: ['2024-01-01T00:00:00Z'], created: ['2024-04-01T00:00:00Z'] }, since)).toBe(
      false,
    );
  });

  it('includes everything without a bound and nothing undated with one', () => {
    expect(isChangedSince({}, undefined)).toBe(true);
    expect(isChangedSince({}, since)).toBe(false);
    expect(isChangedSince({ modified: ['not a date'] }, since)).toBe(false);
  });
});

describe('readOffsetFeed', () => {
  it('stops on a short page', async () => {
    const pages: Record<number, OffsetPage> = {
      0: { items: refs('a', 'b') },
      2: { items: refs('c', 'd') },
      4: { items: refs('e') },
    };
    const fetchPage = jest.fn(async (offset: number) => pages[offset] ?? { items: [] });

    expect(await collectIds(readOffsetFeed(fetchPage, 2))).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
    expect(fetchPage.mock.calls.map(([offset]) => offset)).toEqual([0, 2, 4]);
  });

  it('stops once the reported total is reached', async () => {
    const pages: Record<number, OffsetPage> = {
      0: { items: refs('a', 'b'), total: 4 },
      2: { items: refs('c', 'd'), total: 4 },
    };
    const fetchPage = jest.fn(async (offset: number) => pages[offset] ?? { items: [] });

    expect(await collectIds(readOffsetFeed(fetchPage, 2))).toEqual([
      ['a', 'b'],
      ['c', 'd'],
    ]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });
});

describe('readScrollFeed', () => {
  it('reuses the cursor until a page comes back empty', async () => {
    const continuation: ScrollPage[] = [{ items: refs('c') }, { items: [] }];
    const continueScroll = jest.fn(async (_cursor: string) => continuation.shift() ?? { items: [] });

    const ids = await collectIds(
      readScrollFeed(async () => ({ items: refs('a', 'b'), cursor: 'cursor-1', total: 3 }), continueScroll),
    );

    expect(ids).toEqual([['a', 'b'], ['c']]);
    expect(continueScroll.mock.calls).toEqual([['cursor-1'], ['cursor-1']]);
  });

  it('fails when the first page has results but no cursor', async () => {
    const pages = readScrollFeed(async () => ({ items: refs('a') }), async () => ({ items: [] }));

    await expect(collectIds(pages)).rejects.toBeInstanceOf(FeedError);
  });
});

describe('readPagedFeed', () => {
  const dated = (id: string, changedAt: string): ItemReference => ({ id, url: id, changedAt });

  it('filters entries by date and stops on an empty page', async () => {
    const pages: Record<number, ItemReference[]> = {
      1: [dated('new', '2024-03-02T10:00:00Z'), dated('old', '2024-02-01T10:00:00Z')],
      2: [dated('newer', '2024-03-05T10:00:00Z')],
    };
    const fetchPage = jest.fn(async (index: number) => pages[index] ?? []);

    const ids = await collectIds(readPagedFeed(fetchPage, { since: new Date('2024-03-01T00:00:00Z') }));

    expect(ids).toEqual([['new'], ['newer']]);
    expect(fetchPage.mock.calls.map(([index]) => index)).toEqual([1, 2, 3]);
  });

  it('stops a newest-first feed at the first page entirely before the bound', async () => {
    const pages: Record<number, ItemReference[]> = {
      1: [dated('a', '2024-03-03T00:00:00Z'), dated('b', '2024-02-28T00:00:00Z')],
      2: [dated('c', '2024-02-27T00:00:00Z')],
      3: [dated('d', '2024-02-26T00:00:00Z')],
    };
    const fetchPage = jest.fn(async (index: number) => pages[index] ?? []);

    const ids = await collectIds(
      readPagedFeed(fetchPage, { since: new Date('2024-03-01T00:00:00Z'), newestFirst: true }),
    );

    expect(ids).toEqual([['a']]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });
});

describe('rebatch', () => {
  it('regroups pages into batches of at least the given size', async () => {
    async function* pages() {
      yield refs('1', '2');
      yield refs('3');
      yield refs('4', '5', '6');
      yield refs('7');
    }

    expect(await collectIds(rebatch(pages(), 3))).toEqual([
      ['1', '2', '3'],
      ['4', '5', '6'],
      ['7'],
    ]);
  });
});

describe('fetchFeedPage', () => {
  it('turns a failed page request into a FeedError', async () => {
    const { transport } = routeTransport({ 'https://feed.test/1': makeTextResponse('bad request', 400) });
    const fetcher = new RetryingFetcher({ maxRetries: 0 }, { transport, sleep: noSleep });

    const attempt = fetchFeedPage(fetcher, 'https://feed.test/1', (body) => body);

    await expect(attempt).rejects.toMatchObject({
      name: 'FeedError',
      fetchError: { kind: 'client', status: 400 },
    });
  });
});

describe('walkTree', () => {
  const walk = (nodes: TestNode[], rootIds: string[], batchSize = 2) => {
    const { transport, calls } = routeTransport(nodeRoutes(nodes));
    const fetcher = new RetryingFetcher({ maxRetries: 0 }, { transport, sleep: noSleep });
    const batchFetcher = new BatchFetcher(fetcher, new ResolvedItemCache<TestNode>(), nodeAdapter, 2);
    const pages = walkTree(batchFetcher, {
      rootIds,
      detailUrl: nodeUrl,
      childrenOf: (node) => node.children ?? [],
      batchSize,
    });
    return { pages, calls };
  };

  it('visits every node once even when narrower links form a cycle', async () => {
    const { pages, calls } = walk(
      [
        { id: 'root', label: 'Root', children: ['a', 'b'] },
        { id: 'a', label: 'A', children: ['root', 'b'] },
        { id: 'b', label: 'B', children: ['a'] },
      ],
      ['root'],
    );

    expect(await collectIds(pages)).toEqual([['root'], ['a', 'b']]);
    expect(calls).toHaveLength(3);
  });

  it('skips a child that cannot be fetched', async () => {
    const { pages } = walk([{ id: 'root', label: 'Root', children: ['missing', 'c'] }, { id: 'c', label: 'C' }], ['root']);

    expect(await collectIds(pages)).toEqual([['root'], ['c']]);
  });

  it('fails when a root node cannot be fetched', async () => {
    const { pages } = walk([], ['root']);

    await expect(collectIds(pages)).rejects.toBeInstanceOf(FeedError);
  });
});
