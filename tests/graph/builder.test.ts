/**
 * Dependency Graph Builder Tests
 */

import { describe, it, expect } from 'vitest';
import { buildDependencyGraph } from '../../src/graph/builder.js';
import { ConfigurationError } from '../../src/config/errors.js';
import type { ConfigValue } from '../../src/config/types.js';

describe('buildDependencyGraph', () => {
  const objects = new Map<string, { id: string }>([
    ['db', { id: 'db' }],
    ['cache', { id: 'cache' }],
    ['web', { id: 'web' }],
  ]);

  it('resolves references to deployment objects', () => {
    const raw = new Map<string, ConfigValue[]>([['web', ['db:update', 'cache']]]);

    const graph = buildDependencyGraph(raw, objects);

    expect(graph.get('web')).toEqual([
      { name: 'db', target: { id: 'db' }, kind: 'update' },
      { name: 'cache', target: { id: 'cache' }, kind: 'create' },
    ]);
    expect(graph.get('web')?.[0].target).toBe(objects.get('db'));
  });

  it('preserves declaration order', () => {
    const raw = new Map<string, ConfigValue[]>([['web', ['cache', 'db']]]);
    expect(buildDependencyGraph(raw, objects).get('web')?.map((edge) => edge.name)).toEqual(['cache', 'db']);
  });

  it('only contains entities that declared dependencies', () => {
    const raw = new Map<string, ConfigValue[]>([['web', ['db']]]);
    const graph = buildDependencyGraph(raw, objects);
    expect(Array.from(graph.keys())).toEqual(['web']);
    expect(graph.has('db')).toBe(false);
  });

  it('fails on a dangling reference', () => {
    const raw = new Map<string, ConfigValue[]>([['web', ['db', 'queue']]]);
    expect(() => buildDependencyGraph(raw, objects)).toThrow(ConfigurationError);
    expect(() => buildDependencyGraph(raw, objects)).toThrow('Could not find dependency queue required by web');
  });

  it('returns an empty graph when nothing declares dependencies', () => {
    expect(buildDependencyGraph(new Map(), objects).size).toBe(0);
  });
});
