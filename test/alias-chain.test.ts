import { ResolutionLoopError } from '../src/errors.js';
import type { DnsQuestion } from '../src/types.js';
import {
  EXAMPLE_IP,
  answer,
  cnameRecord,
  createExampleNetwork,
  createTestResolver,
  noData,
} from './dns-test-helpers.js';

// serve CNAME records for the given alias -> target pairs, nothing else
function aliasZone(aliases: Record<string, string>) {
  return (question: DnsQuestion) => {
    const target = aliases[question.query];
    if (question.type === 'CNAME' && target !== undefined) {
      return answer(cnameRecord(question.query, target));
    }
    return noData('example.com');
  };
}

describe('CNAME chain walking', () => {
  test('should follow a chain of aliases to the terminal name', async () => {
    const network = createExampleNetwork(
      aliasZone({ 'a.example.com': 'b.example.com', 'b.example.com': 'c.example.com' })
    );
    const resolver = createTestResolver(network);

    const chain = await resolver.resolveChain('a.example.com');

    expect(chain).toEqual({
      name: 'c.example.com',
      aliases: [
        { alias: 'a.example.com', name: 'b.example.com' },
        { alias: 'b.example.com', name: 'c.example.com' },
      ],
      error: null,
    });
    expect(network.queriesTo(EXAMPLE_IP)).toEqual([
      'a.example.com:CNAME',
      'b.example.com:CNAME',
      'c.example.com:CNAME',
    ]);
  });

  test('should return the name itself when it is not an alias', async () => {
    const network = createExampleNetwork(aliasZone({}));
    const resolver = createTestResolver(network);

    expect(await resolver.resolveChain('example.com')).toEqual({
      name: 'example.com',
      aliases: [],
      error: null,
    });
  });

  test('should normalize the starting name', async () => {
    const network = createExampleNetwork(aliasZone({ 'www.example.com': 'Example.COM.' }));
    const resolver = createTestResolver(network);

    const chain = await resolver.resolveChain('WWW.Example.com.');

    expect(chain.name).toBe('example.com');
    expect(chain.aliases).toEqual([{ alias: 'www.example.com', name: 'example.com' }]);
  });

  test('should stop at a CNAME loop', async () => {
    const network = createExampleNetwork(
      aliasZone({ 'a.example.com': 'b.example.com', 'b.example.com': 'a.example.com' })
    );
    const resolver = createTestResolver(network);

    const chain = await resolver.resolveChain('a.example.com');

    expect(chain.name).toBe('b.example.com');
    expect(chain.aliases).toEqual([
      { alias: 'a.example.com', name: 'b.example.com' },
      { alias: 'b.example.com', name: 'a.example.com' },
    ]);
    expect(chain.error).toBeInstanceOf(ResolutionLoopError);
    expect(chain.error?.message).toBe("CNAME loop: 'a.example.com' was already visited");
  });

  test('should stop a chain longer than maxAliases', async () => {
    const network = createExampleNetwork(
      aliasZone({
        'a.example.com': 'b.example.com',
        'b.example.com': 'c.example.com',
        'c.example.com': 'd.example.com',
      })
    );
    const resolver = createTestResolver(network, { maxAliases: 2 });

    const chain = await resolver.resolveChain('a.example.com');

    expect(chain.name).toBe('c.example.com');
    expect(chain.aliases).toHaveLength(2);
    expect(chain.error).toBeInstanceOf(ResolutionLoopError);
    expect(chain.error?.message).toBe("CNAME chain of 'a.example.com' is longer than 2 aliases");
  });

  test('should accept a chain of exactly maxAliases aliases', async () => {
    const network = createExampleNetwork(
      aliasZone({ 'a.example.com': 'b.example.com', 'b.example.com': 'c.example.com' })
    );
    const resolver = createTestResolver(network, { maxAliases: 2 });

    expect(await resolver.resolveChain('a.example.com')).toEqual({
      name: 'c.example.com',
      aliases: [
        { alias: 'a.example.com', name: 'b.example.com' },
        { alias: 'b.example.com', name: 'c.example.com' },
      ],
      error: null,
    });
  });

  test('should resolve a single alias with maxAliases of one', async () => {
    const network = createExampleNetwork(aliasZone({ 'www.example.com': 'example.com' }));
    const resolver = createTestResolver(network, { maxAliases: 1 });

    const chain = await resolver.resolveChain('www.example.com');

    expect(chain.name).toBe('example.com');
    expect(chain.error).toBeNull();
  });

  test('should treat an unreachable alias lookup as the end of the chain', async () => {
    const network = createExampleNetwork(() => undefined);
    const resolver = createTestResolver(network);

    const chain = await resolver.resolveChain('www.example.com');

    expect(chain).toEqual({ name: 'www.example.com', aliases: [], error: null });
    expect(resolver.cache.get({ query: 'www.example.com', type: 'CNAME' })?.status).toBe(
      'exhausted'
    );
  });
});
