import { describe, expect, it } from 'vitest';
import { detectOverlaps, sameDestination } from '../overlap/detector.js';
import { relateConditionSets, relateConditions } from '../overlap/relation.js';
import { type Condition, folderPlaceholder } from '../types.js';
import { makeCategory, makeRule } from './fixtures.js';

const pdf: Condition = { type: 'extensionEquals', value: 'pdf' };
const draft: Condition = { type: 'nameContains', value: 'draft' };

describe('relateConditions', () => {
  it('compares values of the same kind', () => {
    expect(relateConditions(pdf, { type: 'extensionEquals', value: '.PDF' })).toBe('identical');
    expect(relateConditions(pdf, { type: 'extensionEquals', value: 'doc' })).toBe('none');
    expect(relateConditions({ type: 'largerThan', bytes: 1000 }, { type: 'largerThan', bytes: 1000 })).toBe(
      'identical',
    );
  });

  it('treats a stricter bound as the narrower condition', () => {
    const thirty: Condition = { type: 'olderThan', days: 30 };
    const seven: Condition = { type: 'olderThan', days: 7 };

    expect(relateConditions(thirty, seven)).toBe('subset');
    expect(relateConditions(seven, thirty)).toBe('superset');
    expect(relateConditions({ type: 'olderThan', days: 30, extension: 'pdf' }, seven)).toBe('subset');
    expect(
      relateConditions({ type: 'olderThan', days: 30, extension: 'pdf' }, { type: 'olderThan', days: 30, extension: 'doc' }),
    ).toBe('none');
  });

  it('nests name patterns by containment', () => {
    expect(relateConditions({ type: 'nameContains', value: 'invoice_2024' }, { type: 'nameContains', value: 'Invoice' })).toBe(
      'subset',
    );
    expect(relateConditions({ type: 'nameStartsWith', value: 'Inv' }, { type: 'nameStartsWith', value: 'Invoice' })).toBe(
      'superset',
    );
    expect(relateConditions({ type: 'nameStartsWith', value: 'Inv' }, { type: 'nameStartsWith', value: 'Rep' })).toBe(
      'none',
    );
    expect(relateConditions({ type: 'nameContains', value: 'invoice' }, { type: 'nameContains', value: '2024' })).toBe(
      'none',
    );
  });

  it('assumes different kinds may overlap', () => {
    expect(relateConditions(pdf, draft)).toBe('partial');
    expect(relateConditions(pdf, { type: 'largerThan', bytes: 10 })).toBe('partial');
  });

  it('handles negation', () => {
    expect(relateConditions({ type: 'negated', condition: pdf }, pdf)).toBe('none');
    expect(
      relateConditions(
        { type: 'negated', condition: { type: 'olderThan', days: 30 } },
        { type: 'negated', condition: { type: 'olderThan', days: 7 } },
      ),
    ).toBe('superset');
  });

  it('compares time windows and weekday sets', () => {
    const window = (startHour: number, endHour: number): Condition => ({ type: 'timeOfDay', startHour, endHour });
    const days = (...d: number[]): Condition => ({ type: 'dayOfWeek', days: d });

    expect(relateConditions(window(9, 12), window(9, 17))).toBe('subset');
    expect(relateConditions(window(9, 12), window(13, 17))).toBe('none');
    expect(relateConditions(window(9, 14), window(12, 17))).toBe('partial');
    expect(relateConditions(days(1, 7), days(7, 1))).toBe('identical');
    expect(relateConditions(days(2), days(2, 3))).toBe('subset');
    expect(relateConditions(days(1), days(2))).toBe('none');
  });
});

describe('relateConditionSets', () => {
  it('ignores order in identical sets', () => {
    expect(
      relateConditionSets(
        { conditions: [pdf, draft], combinator: 'and' },
        { conditions: [draft, { type: 'extensionEquals', value: 'PDF' }], combinator: 'and' },
      ),
    ).toBe('identical');
  });

  it('treats fewer AND-ed conditions as the broader rule', () => {
    expect(
      relateConditionSets({ conditions: [pdf], combinator: 'single' }, { conditions: [pdf, draft], combinator: 'and' }),
    ).toBe('superset');
    expect(
      relateConditionSets({ conditions: [pdf, draft], combinator: 'and' }, { conditions: [pdf], combinator: 'single' }),
    ).toBe('subset');
  });

  it('falls back to pairwise overlap', () => {
    const doc: Condition = { type: 'extensionEquals', value: 'doc' };
    expect(
      relateConditionSets({ conditions: [pdf, doc], combinator: 'or' }, { conditions: [pdf], combinator: 'single' }),
    ).toBe('partial');
    expect(
      relateConditionSets(
        { conditions: [{ type: 'extensionEquals', value: 'png' }], combinator: 'single' },
        { conditions: [pdf], combinator: 'single' },
      ),
    ).toBe('none');
    expect(relateConditionSets({ conditions: [], combinator: 'and' }, { conditions: [pdf], combinator: 'single' })).toBe(
      'none',
    );
  });
});

describe('detectOverlaps', () => {
  const candidate = makeRule('cand', { name: 'All PDFs', destination: folderPlaceholder('Documents') });

  it('flags a broader candidate as a superset of a narrower rule', () => {
    const drafts = makeRule('ex', {
      name: 'PDF drafts',
      combinator: 'and',
      conditions: [pdf, draft],
      destination: folderPlaceholder('Documents'),
    });

    const [overlap] = detectOverlaps(candidate, [drafts]);

    expect(overlap).toEqual({
      existingRule: drafts,
      type: 'superset',
      severity: 1,
      explanation: "This rule also matches every file 'General/PDF drafts' matches.",
      suggestion: "Keep 'General/PDF drafts' at a higher priority so its narrower match is not shadowed.",
    });
  });

  it('sorts overlaps by severity, most severe first', () => {
    const partial = makeRule('e1', {
      conditions: [{ type: 'nameContains', value: 'report' }],
      destination: folderPlaceholder('Reports'),
    });
    const narrower = makeRule('e2', {
      combinator: 'and',
      conditions: [pdf, draft],
      destination: folderPlaceholder('Documents'),
    });
    const duplicate = makeRule('e3', { destination: folderPlaceholder('Documents') });
    const conflicting = makeRule('e4', {
      conditions: [{ type: 'extensionEquals', value: 'PDF' }],
      destination: folderPlaceholder('Other'),
      category: makeCategory('fin', { name: 'Finance' }),
    });

    const overlaps = detectOverlaps(candidate, [partial, narrower, duplicate, conflicting]);

    expect(overlaps.map(o => [o.existingRule.id, o.type, o.severity])).toEqual([
      ['e3', 'exactDuplicate', 3],
      ['e4', 'conflictingDestination', 2],
      ['e2', 'superset', 1],
      ['e1', 'partialOverlap', 0],
    ]);
    expect(overlaps[1].explanation).toBe(
      "Same conditions as 'Finance/Rule e4', but files go to Documents instead of Other.",
    );
    const severities = overlaps.map(o => o.severity);
    expect(severities).toEqual([...severities].sort((a, b) => b - a));
  });

  it('ignores partial overlaps that share a destination', () => {
    const sameDest = makeRule('e1', {
      conditions: [{ type: 'nameContains', value: 'report' }],
      destination: folderPlaceholder('Documents'),
    });
    expect(detectOverlaps(candidate, [sameDest])).toEqual([]);
  });

  it('skips disabled rules and the rule being edited', () => {
    const disabled = makeRule('off', { isEnabled: false, destination: folderPlaceholder('Documents') });
    const self = makeRule('cand', { destination: folderPlaceholder('Documents') });

    expect(detectOverlaps(candidate, [disabled, self], { excludeRuleId: 'cand' })).toEqual([]);
  });

  it('skips rules whose folder scopes cannot meet', () => {
    const scoped = (id: string, path: string) =>
      makeCategory(id, { scope: { kind: 'folders', folders: [{ path, displayName: id }] } });
    const desktopCandidate = makeRule('cand', {
      destination: folderPlaceholder('Documents'),
      category: scoped('desk', '/Users/test/Desktop'),
    });
    const downloads = makeRule('dl', {
      destination: folderPlaceholder('Documents'),
      category: scoped('dl', '/Users/test/Downloads'),
    });
    const screenshots = makeRule('shots', {
      destination: folderPlaceholder('Documents'),
      category: scoped('shots', '/Users/test/Desktop/Screenshots'),
    });

    expect(detectOverlaps(desktopCandidate, [downloads, screenshots]).map(o => o.existingRule.id)).toEqual(['shots']);
  });
});

describe('sameDestination', () => {
  it('compares trash, folders and absence', () => {
    expect(sameDestination({ kind: 'trash' }, { kind: 'trash' })).toBe(true);
    expect(sameDestination(undefined, undefined)).toBe(true);
    expect(sameDestination({ kind: 'trash' }, folderPlaceholder('Trash'))).toBe(false);
    expect(sameDestination(folderPlaceholder('A'), undefined)).toBe(false);
    expect(sameDestination(folderPlaceholder('A'), folderPlaceholder('A'))).toBe(true);
  });
});
