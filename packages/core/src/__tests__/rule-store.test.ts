import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { patternToRule } from '../learning/patterns.js';
import { folderPlaceholder } from '../types.js';
import { Workspace } from '../workspace.js';
import { makePattern } from './fixtures.js';

describe('RuleStore', () => {
  let tmpDir: string;
  let workspace: Workspace;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'fw-rules-'));
    workspace = Workspace.init(tmpDir, 'test-workspace');
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('Rules', () => {
    it('creates rules with defaults and appends them to the priority order', () => {
      const first = workspace.rules.addRule({
        name: 'PDFs',
        conditions: [{ type: 'extensionEquals', value: 'pdf' }],
        destination: folderPlaceholder('Documents'),
      });
      const second = workspace.rules.addRule({
        name: 'Images',
        conditions: [{ type: 'kindEquals', kind: 'image' }],
        destination: folderPlaceholder('Pictures'),
      });

      expect(first.id).toMatch(/^rule_/);
      expect(first).toMatchObject({
        combinator: 'single',
        exclusions: [],
        action: 'move',
        isEnabled: true,
        sortOrder: 0,
      });
      expect(second.sortOrder).toBe(1);
      expect(workspace.rules.getRule(first.id)).toEqual(first);
    });

    it('lists rules by priority', () => {
      workspace.rules.addRule({ name: 'Low', conditions: [], sortOrder: 5 });
      workspace.rules.addRule({ name: 'High', conditions: [], sortOrder: 1 });

      expect(workspace.rules.listRules().map(r => r.name)).toEqual(['High', 'Low']);
    });

    it('updates, toggles and removes rules', () => {
      const rule = workspace.rules.addRule({ name: 'PDFs', conditions: [] });

      expect(workspace.rules.updateRule(rule.id, { name: 'All PDFs' }).name).toBe('All PDFs');
      expect(workspace.rules.setRuleEnabled(rule.id, false).isEnabled).toBe(false);

      workspace.rules.removeRule(rule.id);
      expect(workspace.rules.listRules()).toEqual([]);
    });

    it('rejects unknown ids', () => {
      expect(() => workspace.rules.updateRule('nope', { name: 'x' })).toThrow('Rule not found: nope');
      expect(() => workspace.rules.removeRule('nope')).toThrow('Rule not found: nope');
      expect(() => workspace.rules.addRule({ name: 'x', conditions: [], categoryId: 'nope' })).toThrow(
        'Category not found: nope',
      );
    });

    it('stores rules converted from patterns', () => {
      const rule = patternToRule(makePattern({ id: 'pat_abc' }));

      workspace.rules.insertRule(rule);

      expect(workspace.rules.getRule('rule_abc')).toEqual(rule);
      expect(() => workspace.rules.insertRule(rule)).toThrow('Rule already exists: rule_abc');
    });

    it('persists across workspace instances', () => {
      const rule = workspace.rules.addRule({ name: 'PDFs', conditions: [{ type: 'extensionEquals', value: 'pdf' }] });

      expect(Workspace.open(tmpDir).rules.getRule(rule.id)).toEqual(rule);
    });
  });

  describe('Categories', () => {
    it('attaches the category to its rules', () => {
      const finance = workspace.rules.addCategory('Finance', {
        scope: { kind: 'folders', folders: [{ path: '/Users/test/Documents', displayName: 'Documents' }] },
      });
      const rule = workspace.rules.addRule({ name: 'Invoices', conditions: [], categoryId: finance.id });

      expect(finance.id).toMatch(/^cat_/);
      expect(finance.isEnabled).toBe(true);
      expect(rule.category).toEqual(finance);
      expect(workspace.rules.listRules()[0].category).toEqual(finance);
    });

    it('reflects category state in hydrated rules', () => {
      const finance = workspace.rules.addCategory('Finance');
      const rule = workspace.rules.addRule({ name: 'Invoices', conditions: [], categoryId: finance.id });

      workspace.rules.setCategoryEnabled(finance.id, false);

      expect(workspace.rules.getRule(rule.id)?.category?.isEnabled).toBe(false);
    });

    it('makes rules global when their category is removed', () => {
      const finance = workspace.rules.addCategory('Finance');
      const rule = workspace.rules.addRule({ name: 'Invoices', conditions: [], categoryId: finance.id });

      workspace.rules.removeCategory(finance.id);

      expect(workspace.rules.listCategories()).toEqual([]);
      expect(workspace.rules.getRule(rule.id)).not.toHaveProperty('category');
    });
  });
});
