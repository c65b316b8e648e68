import { describe, expect, it } from 'vitest';

import { RelationshipKind, SocialRole } from '@/enums';
import { loadScenario } from '@/data/scenarios';
import { ConfigurationError } from '@/lib/diagnostics/errors';
import { diffWorlds } from '@/lib/model/diff';
import { canonicalJson, digestWorld, hydrateWorld, serializeWorld } from '@/lib/model/snapshot';
import { cloneWorld } from '@/lib/model/world';

function issuesOf(input: unknown): Array<{ path: string; message: string }> {
  try {
    hydrateWorld(input);
  } catch (err) {
    if (err instanceof ConfigurationError) return err.issues;
    throw err;
  }
  throw new Error('expected hydration to fail');
}

describe('hydrateWorld', () => {
  it('builds classes, territories and edges with defaults filled', () => {
    const w = loadScenario('two-node');
    expect(Object.keys(w.entities).sort()).toEqual(['core', 'periphery']);
    expect(w.entities.periphery.role).toBe(SocialRole.PeripheryProletariat);
    expect(w.entities.periphery.subsistenceThreshold).toBe(0.3);
    const edge = w.relationships['extraction:periphery->core'];
    expect(edge).toEqual({
      id: 'extraction:periphery->core',
      kind: RelationshipKind.Extraction,
      sourceId: 'periphery',
      targetId: 'core',
      strength: 1,
      flow: 0,
    });
    expect(w.aggregates.imperialRentPool).toBe(100);
    expect(w.terminal).toBeNull();
  });

  it('rejects edges that point at unknown nodes', () => {
    const issues = issuesOf({
      nodes: [{ type: 'social_class', id: 'a', role: 'periphery_proletariat' }],
      edges: [{ kind: 'solidarity', sourceId: 'a', targetId: 'ghost' }],
    });
    expect(issues).toEqual([{ path: 'edges.solidarity:a->ghost.targetId', message: 'unknown node "ghost"' }]);
  });

  it('rejects duplicate ids', () => {
    const issues = issuesOf({
      nodes: [
        { type: 'social_class', id: 'a', role: 'periphery_proletariat' },
        { type: 'social_class', id: 'a', role: 'core_bourgeoisie' },
      ],
    });
    expect(issues).toEqual([{ path: 'nodes', message: '[world] duplicate entity id "a"' }]);
  });

  it('rejects a class placed in a missing territory', () => {
    const issues = issuesOf({
      nodes: [{ type: 'social_class', id: 'a', role: 'periphery_proletariat', territoryId: 'nowhere' }],
    });
    expect(issues).toEqual([{ path: 'nodes.a.territoryId', message: 'unknown territory "nowhere"' }]);
  });

  it('rejects out-of-range attributes with their path', () => {
    const issues = issuesOf({
      nodes: [{ type: 'social_class', id: 'a', role: 'periphery_proletariat', organization: 2 }],
    });
    expect(issues.map(i => i.path)).toEqual(['nodes.0.organization']);
  });
});

describe('serializeWorld', () => {
  it('round-trips through hydrateWorld', () => {
    const w = loadScenario('imperial-circuit');
    expect(hydrateWorld(serializeWorld(w))).toEqual(w);
  });

  it('carries template cooldowns across a round trip', () => {
    const w = loadScenario('two-node');
    w.templateTriggers = { EVT_walkout: 3 };
    const s = serializeWorld(w);
    expect(s.templateTriggers).toEqual({ EVT_walkout: 3 });
    expect(hydrateWorld(s).templateTriggers).toEqual({ EVT_walkout: 3 });
  });

  it('lists nodes and edges sorted by id', () => {
    const s = serializeWorld(loadScenario('imperial-circuit'));
    expect(s.nodes.map(n => n.id)).toEqual(['aristocracy', 'comprador', 'core', 'workers', 'hinterland', 'metropole']);
    const ids = s.edges.map(e => e.id);
    expect(ids).toEqual([...ids].sort());
  });
});

describe('digestWorld', () => {
  it('is stable for equal worlds and sensitive to any field', () => {
    const a = loadScenario('two-node');
    const b = loadScenario('two-node');
    expect(digestWorld(a)).toBe(digestWorld(b));
    expect(digestWorld(a)).toMatch(/^[0-9a-f]{16}$/);
    b.entities.periphery.wealth = 99;
    expect(digestWorld(b)).not.toBe(digestWorld(a));
  });

  it('sorts keys at every level', () => {
    expect(canonicalJson({ b: 1, a: { d: 1, c: [2, { f: 0, e: 1 }] } })).toBe('{"a":{"c":[2,{"e":1,"f":0}],"d":1},"b":1}');
  });
});

describe('diffWorlds', () => {
  it('reports added, removed and changed ids', () => {
    const prev = loadScenario('two-node');
    const next = cloneWorld(prev);
    next.entities.periphery.wealth = 20;
    delete next.relationships['extraction:periphery->core'];
    const d = diffWorlds(prev, next);
    expect(d.entities).toEqual({ added: [], removed: [], changed: ['periphery'] });
    expect(d.relationships).toEqual({ added: [], removed: ['extraction:periphery->core'], changed: [] });
  });
});
