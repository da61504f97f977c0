import { describe, expect, it, vi } from 'vitest';
import { ClassificationEngine, sortRules } from '../engine/classifier.js';
import { silentLogger, type DestinationResolver } from '../engine/types.js';
import { folderPlaceholder } from '../types.js';
import { FakeResolver, makeCategory, makeFile, makeRule, resolvedFolder } from './fixtures.js';

const NOW = new Date('2024-03-01T12:00:00.000Z');

function engineWith(resolver: DestinationResolver, logger = silentLogger): ClassificationEngine {
  return new ClassificationEngine({ resolver, now: () => NOW, logger });
}

describe('ClassificationEngine', () => {
  describe('first match wins', () => {
    const invoices = makeRule('r1', {
      name: 'PDF invoices',
      combinator: 'and',
      conditions: [
        { type: 'extensionEquals', value: 'pdf' },
        { type: 'nameContains', value: 'invoice' },
      ],
      destination: folderPlaceholder('Documents/Invoices'),
    });
    const pdfs = makeRule('r2', {
      name: 'PDFs',
      destination: folderPlaceholder('Documents/PDF'),
    });

    it('sends an invoice to the compound rule with high confidence', () => {
      const engine = engineWith(new FakeResolver(['Documents/Invoices', 'Documents/PDF']));
      const result = engine.classify(makeFile('Invoice_2024.pdf'), [invoices, pdfs]);

      expect(result.status).toBe('ready');
      expect(result.destination).toEqual(resolvedFolder('Documents/Invoices'));
      expect(result.confidenceScore).toBe(0.9);
      expect(result.matchedRuleId).toBe('r1');
      expect(result.suggestionSource).toBe('rule');
      expect(result.matchReason).toBe("Extension is .pdf AND name contains 'invoice'");
    });

    it('sends other PDFs to the extension rule', () => {
      const engine = engineWith(new FakeResolver(['Documents/Invoices', 'Documents/PDF']));
      const result = engine.classify(makeFile('Report.pdf'), [invoices, pdfs]);

      expect(result.destination).toEqual(resolvedFolder('Documents/PDF'));
      expect(result.confidenceScore).toBe(0.5);
      expect(result.matchedRuleId).toBe('r2');
      expect(result.matchReason).toBe('Extension is .pdf');
    });

    it('lets list order decide between two matching rules', () => {
      const engine = engineWith(new FakeResolver(['A', 'B']));
      const byExtension = makeRule('a', { destination: folderPlaceholder('A') });
      const byName = makeRule('b', {
        conditions: [{ type: 'nameContains', value: 'report' }],
        destination: folderPlaceholder('B'),
      });
      const file = makeFile('report.pdf');

      expect(engine.classify(file, [byExtension, byName]).matchedRuleId).toBe('a');
      expect(engine.classify(file, [byName, byExtension]).matchedRuleId).toBe('b');
    });
  });

  describe('non-matches', () => {
    it('clears every decision field when nothing matches', () => {
      const engine = engineWith(new FakeResolver(['Documents']));
      const decided = makeFile('song.mp3', {
        status: 'ready',
        destination: resolvedFolder('Music'),
        matchReason: 'old',
        confidenceScore: 0.7,
        matchedRuleId: 'stale',
        suggestionSource: 'rule',
      });

      const result = engine.classify(decided, [makeRule('r')]);

      expect(result.status).toBe('pending');
      expect(result).not.toHaveProperty('destination');
      expect(result).not.toHaveProperty('matchReason');
      expect(result).not.toHaveProperty('confidenceScore');
      expect(result).not.toHaveProperty('matchedRuleId');
      expect(result).not.toHaveProperty('suggestionSource');
      expect(result.name).toBe('song.mp3');
    });

    it('skips disabled rules', () => {
      const engine = engineWith(new FakeResolver(['A', 'B']));
      const disabled = makeRule('a', { isEnabled: false, destination: folderPlaceholder('A') });
      const enabled = makeRule('b', { destination: folderPlaceholder('B') });

      expect(engine.classify(makeFile('x.pdf'), [disabled, enabled]).matchedRuleId).toBe('b');
    });

    it('vetoes a rule when any exclusion matches', () => {
      const engine = engineWith(new FakeResolver(['A', 'B']));
      const noDrafts = makeRule('a', {
        exclusions: [
          { type: 'nameContains', value: 'draft' },
          { type: 'largerThan', bytes: 10_000_000 },
        ],
        destination: folderPlaceholder('A'),
      });
      const fallback = makeRule('b', {
        conditions: [{ type: 'nameContains', value: 'draft' }],
        destination: folderPlaceholder('B'),
      });

      expect(engine.classify(makeFile('draft-v2.pdf'), [noDrafts]).status).toBe('pending');
      expect(engine.classify(makeFile('draft-v2.pdf'), [noDrafts, fallback]).matchedRuleId).toBe('b');
      expect(engine.classify(makeFile('final.pdf'), [noDrafts, fallback]).matchedRuleId).toBe('a');
    });
  });

  describe('category scope', () => {
    it('never matches rules in a disabled category', () => {
      const engine = engineWith(new FakeResolver(['Documents']));
      const rule = makeRule('r', { category: makeCategory('c', { isEnabled: false }) });

      expect(engine.classify(makeFile('x.pdf'), [rule]).status).toBe('pending');
    });

    it('only matches files under a scoped folder', () => {
      const engine = engineWith(new FakeResolver(['Documents']));
      const rule = makeRule('r', {
        category: makeCategory('c', {
          scope: { kind: 'folders', folders: [{ path: '/Users/test/Desktop', displayName: 'Desktop' }] },
        }),
      });

      expect(engine.classify(makeFile('x.pdf', { path: '/Users/test/Desktop/x.pdf' }), [rule]).status).toBe(
        'ready',
      );
      expect(engine.classify(makeFile('x.pdf', { path: '/Users/test/Downloads/x.pdf' }), [rule]).status).toBe(
        'pending',
      );
      expect(engine.classify(makeFile('x.pdf', { path: '/Users/test/Desktop2/x.pdf' }), [rule]).status).toBe(
        'pending',
      );
    });
  });

  describe('destinations', () => {
    it('falls through to a later rule when a destination cannot be resolved', () => {
      const resolver = new FakeResolver(['Documents']);
      const engine = engineWith(resolver);
      const unreachable = makeRule('r1', { destination: folderPlaceholder('Missing') });
      const reachable = makeRule('r2', { destination: folderPlaceholder('Documents') });

      const result = engine.classify(makeFile('x.pdf'), [unreachable, reachable]);

      expect(result.matchedRuleId).toBe('r2');
      expect(result.destination).toEqual(resolvedFolder('Documents'));
      expect(resolver.calls).toEqual(['Missing', 'Documents']);
    });

    it('treats a throwing resolver as a failed resolution and logs it', () => {
      const warn = vi.fn();
      const engine = engineWith(
        {
          resolve: () => {
            throw new Error('permission denied');
          },
        },
        { debug: vi.fn(), warn },
      );
      const move = makeRule('r1');
      const trash = makeRule('r2', { action: 'delete', destination: undefined });

      const result = engine.classify(makeFile('x.pdf'), [move, trash]);

      expect(result.matchedRuleId).toBe('r2');
      expect(result.destination).toEqual({ kind: 'trash' });
      expect(warn).toHaveBeenCalled();
    });

    it('resolves each display path once per engine', () => {
      const resolver = new FakeResolver(['Documents']);
      const engine = engineWith(resolver);
      const rule = makeRule('r');

      engine.classifyBatch([makeFile('a.pdf'), makeFile('b.pdf')], [rule]);
      expect(resolver.calls).toEqual(['Documents']);
      expect(engine.cacheSize).toBe(1);

      engine.clearCache();
      expect(engine.cacheSize).toBe(0);
      engine.classify(makeFile('c.pdf'), [rule]);
      expect(resolver.calls).toEqual(['Documents', 'Documents']);
    });

    it('does not cache failures', () => {
      const resolver = new FakeResolver([]);
      const engine = engineWith(resolver);

      engine.classifyBatch([makeFile('a.pdf'), makeFile('b.pdf')], [makeRule('r')]);
      expect(resolver.calls).toEqual(['Documents', 'Documents']);
      expect(engine.cacheSize).toBe(0);
    });

    it('uses already-resolved destinations as they are', () => {
      const resolver = new FakeResolver([]);
      const engine = engineWith(resolver);
      const rule = makeRule('r', { destination: resolvedFolder('Archive') });

      expect(engine.classify(makeFile('x.pdf'), [rule]).destination).toEqual(resolvedFolder('Archive'));
      expect(resolver.calls).toEqual([]);
    });

    it('sends delete rules to the trash whatever their destination', () => {
      const resolver = new FakeResolver([]);
      const engine = engineWith(resolver);
      const rule = makeRule('r', { action: 'delete', destination: folderPlaceholder('Elsewhere') });

      expect(engine.classify(makeFile('x.pdf'), [rule]).destination).toEqual({ kind: 'trash' });
      expect(resolver.calls).toEqual([]);
    });

    it('skips a move rule with no destination', () => {
      const engine = engineWith(new FakeResolver(['B']));
      const broken = makeRule('a', { destination: undefined });
      const working = makeRule('b', { destination: folderPlaceholder('B') });

      expect(engine.classify(makeFile('x.pdf'), [broken, working]).matchedRuleId).toBe('b');
    });
  });

  describe('classifyBatch', () => {
    it('keeps input order and leaves inputs untouched', () => {
      const engine = engineWith(new FakeResolver(['Documents']));
      const files = [makeFile('a.pdf'), makeFile('b.txt'), makeFile('c.pdf')];

      const results = engine.classifyBatch(files, [makeRule('r')]);

      expect(results.map(f => [f.name, f.status])).toEqual([
        ['a.pdf', 'ready'],
        ['b.txt', 'pending'],
        ['c.pdf', 'ready'],
      ]);
      expect(files[0].status).toBe('pending');
      expect(files[0]).not.toHaveProperty('destination');
    });
  });

  it('reports whether a file matches a rule without resolving anything', () => {
    const resolver = new FakeResolver([]);
    const engine = engineWith(resolver);

    expect(engine.fileMatchesRule(makeFile('x.pdf'), makeRule('r'))).toBe(true);
    expect(engine.fileMatchesRule(makeFile('x.doc'), makeRule('r'))).toBe(false);
    expect(resolver.calls).toEqual([]);
  });
});

describe('sortRules', () => {
  it('orders by sortOrder, then creation date', () => {
    const rules = [
      makeRule('late', { sortOrder: 2 }),
      makeRule('newer', { sortOrder: 1, creationDate: '2024-02-01T00:00:00.000Z' }),
      makeRule('older', { sortOrder: 1, creationDate: '2024-01-01T00:00:00.000Z' }),
    ];

    expect(sortRules(rules).map(r => r.id)).toEqual(['older', 'newer', 'late']);
  });
});
