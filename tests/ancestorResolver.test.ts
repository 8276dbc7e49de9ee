import { AncestorResolver } from '../harvester/services/ancestorResolver';
import { ResolvedItemCache } from '../harvester/services/resolvedItemCache';
import { RetryingFetcher } from '../harvester/services/retryingFetcher';
import { logger } from '../utils/logger';
import { nodeAdapter, nodeRoutes, nodeUrl, noSleep, routeTransport, type TestNode } from './helpers';

const setup = (nodes: TestNode[], cached: TestNode[] = []) => {
  const { transport, calls } = routeTransport(nodeRoutes(nodes));
  const cache = new ResolvedItemCache<TestNode>();
  cache.merge(cached.map((node) => [node.id, node] as const));
  const resolver = new AncestorResolver(
    new RetryingFetcher({ maxRetries: 0 }, { transport, sleep: noSleep }),
    cache,
    nodeAdapter,
    'test',
  );
  return { resolver, cache, calls };
};

const summarize = (chain: { entries: Array<{ id: string; order: number; heading: { label: string } }> }) =>
  chain.entries.map((entry) => [entry.id, entry.heading.label, entry.order]);

describe('AncestorResolver', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('walks to the root, fetching ancestors that are not cached', async () => {
    const { resolver, cache, calls } = setup(
      [{ id: 'region', label: 'Region', parent: 'country' }],
      [{ id: 'country', label: 'Country' }],
    );

    const chain = await resolver.resolveChain({ id: 'town', label: 'Town', parent: 'region' });

    expect(summarize(chain)).toEqual([
      ['region', 'Region', 1],
      ['country', 'Country', 2],
    ]);
    expect(chain.stop).toBe('root');
    expect(calls).toEqual([nodeUrl('region')]);
    expect(cache.has('region')).toBe(true);
  });

  it('returns an empty chain for an item without a parent', async () => {
    const { resolver } = setup([]);

    expect(await resolver.resolveChain({ id: 'p1', label: 'P1' })).toEqual({ entries: [], stop: 'root' });
  });

  it('stops at an access-denied ancestor without a heading for it', async () => {
    const { resolver } = setup([], [
      { id: 'parent', label: 'Parent', parent: 'secret' },
      { id: 'secret', label: 'Secret', parent: 'root', accessDenied: true },
      { id: 'root', label: 'Root' },
    ]);

    const chain = await resolver.resolveChain({ id: 'child', label: 'Child', parent: 'parent' });

    expect(summarize(chain)).toEqual([['parent', 'Parent', 1]]);
    expect(chain.stop).toBe('access-denied');
  });

  it('stops at the top concept', async () => {
    const { resolver } = setup([], [
      { id: 'broader', label: 'Broader', parent: 'top' },
      { id: 'top', label: 'Top', top: true },
    ]);

    const chain = await resolver.resolveChain({ id: 'narrow', label: 'Narrow', parent: 'broader' });

    expect(summarize(chain)).toEqual([['broader', 'Broader', 1]]);
    expect(chain.stop).toBe('top-concept');
  });

  it('skips an unlabelled ancestor without advancing the order', async () => {
    const warn = jest.spyOn(logger, 'warn');
    const { resolver } = setup([], [
      { id: 'unnamed', parent: 'named' },
      { id: 'named', label: 'Named' },
    ]);

    const chain = await resolver.resolveChain({ id: 'child', label: 'Child', parent: 'unnamed' });

    expect(summarize(chain)).toEqual([['named', 'Named', 1]]);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining(nodeUrl('unnamed')), expect.anything());
  });

  it('terminates an A -> B -> A cycle and reports it', async () => {
    const error = jest.spyOn(logger, 'error');
    const a: TestNode = { id: 'A', label: 'A', parent: 'B' };
    const { resolver } = setup([], [a, { id: 'B', label: 'B', parent: 'A' }]);

    const chain = await resolver.resolveChain(a);

    expect(summarize(chain)).toEqual([['B', 'B', 1]]);
    expect(chain.stop).toBe('cycle');
    expect(error).toHaveBeenCalledWith(expect.stringContaining('Cyclic ancestry'), expect.anything());
  });

  it('never lists an identifier twice in a longer cycle', async () => {
    const { resolver } = setup([], [
      { id: 'B', label: 'B', parent: 'C' },
      { id: 'C', label: 'C', parent: 'D' },
      { id: 'D', label: 'D', parent: 'B' },
    ]);

    const chain = await resolver.resolveChain({ id: 'A', label: 'A', parent: 'B' });

    const ids = chain.entries.map((entry) => entry.id);
    expect(ids).toEqual(['B', 'C', 'D']);
    expect(chain.stop).toBe('cycle');
  });

  it('truncates the chain at an ancestor that cannot be fetched', async () => {
    const { resolver } = setup([], [{ id: 'parent', label: 'Parent', parent: 'missing' }]);

    const chain = await resolver.resolveChain({ id: 'child', label: 'Child', parent: 'parent' });

    expect(summarize(chain)).toEqual([['parent', 'Parent', 1]]);
    expect(chain.stop).toBe('unresolvable');
  });
});
