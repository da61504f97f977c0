import { z } from 'zod';
import { sortRules } from './engine/classifier.js';
import { JsonStore } from './storage.js';
import {
  type Category,
  CategorySchema,
  type Rule,
  type StoredRule,
  StoredRuleSchema,
} from './types.js';
import { generateId, now } from './utils.js';

const RulesFileSchema = z.object({
  rules: z.array(StoredRuleSchema).default([]),
  categories: z.array(CategorySchema).default([]),
});
type RulesData = z.infer<typeof RulesFileSchema>;

export type NewRuleInput = Omit<z.input<typeof StoredRuleSchema>, 'id' | 'creationDate'> & {
  id?: string;
  creationDate?: string;
};

export type RuleUpdate = Partial<Omit<StoredRule, 'id' | 'creationDate'>>;

export type NewCategoryInput = Omit<z.input<typeof CategorySchema>, 'id' | 'name'>;

function hydrate(stored: StoredRule, categories: readonly Category[]): Rule {
  const { categoryId, ...rule } = stored;
  const category = categoryId === undefined ? undefined : categories.find(c => c.id === categoryId);
  return category ? { ...rule, category } : rule;
}

function dehydrate(rule: Rule): StoredRule {
  const { category, ...stored } = rule;
  return category ? { ...stored, categoryId: category.id } : stored;
}

/** Rules and categories, persisted together in `rules.json`. */
export class RuleStore {
  private store: JsonStore<RulesData>;

  constructor(root: string) {
    this.store = new JsonStore(root, 'rules.json', RulesFileSchema, { rules: [], categories: [] });
  }

  // ── Rules ───────────────────────────────────────────────────

  /** New rules go to the end of the priority order unless given a sortOrder. */
  addRule(input: NewRuleInput): Rule {
    const { rules, categories } = this.store.read();
    if (input.categoryId !== undefined && !categories.some(c => c.id === input.categoryId)) {
      throw new Error(`Category not found: ${input.categoryId}`);
    }

    const stored = StoredRuleSchema.parse({
      ...input,
      id: input.id ?? generateId('rule'),
      creationDate: input.creationDate ?? now(),
      sortOrder: input.sortOrder ?? sortOrderAfter(rules),
    });
    this.insertStored(stored);
    return hydrate(stored, categories);
  }

  /** Stores an already-built rule, e.g. one converted from a pattern. */
  insertRule(rule: Rule): Rule {
    if (rule.category) this.requireCategory(rule.category.id);
    this.insertStored(StoredRuleSchema.parse(dehydrate(rule)));
    return rule;
  }

  updateRule(id: string, updates: RuleUpdate): Rule {
    if (updates.categoryId !== undefined) this.requireCategory(updates.categoryId);

    let updated: StoredRule | undefined;
    const data = this.store.update(current => ({
      ...current,
      rules: current.rules.map(r => {
        if (r.id !== id) return r;
        updated = StoredRuleSchema.parse({ ...r, ...updates });
        return updated;
      }),
    }));

    if (!updated) throw new Error(`Rule not found: ${id}`);
    return hydrate(updated, data.categories);
  }

  setRuleEnabled(id: string, isEnabled: boolean): Rule {
    return this.updateRule(id, { isEnabled });
  }

  removeRule(id: string): void {
    if (!this.getRule(id)) throw new Error(`Rule not found: ${id}`);
    this.store.update(data => ({
      ...data,
      rules: data.rules.filter(r => r.id !== id),
    }));
  }

  getRule(id: string): Rule | undefined {
    const { rules, categories } = this.store.read();
    const stored = rules.find(r => r.id === id);
    return stored ? hydrate(stored, categories) : undefined;
  }

  /** Every rule with its category attached, in priority order. */
  listRules(): Rule[] {
    const { rules, categories } = this.store.read();
    return sortRules(rules).map(r => hydrate(r, categories));
  }

  /** The sortOrder that puts a new rule after every existing one. */
  nextSortOrder(): number {
    return sortOrderAfter(this.store.read().rules);
  }

  // ── Categories ──────────────────────────────────────────────

  addCategory(name: string, opts: NewCategoryInput = {}): Category {
    const category = CategorySchema.parse({ ...opts, id: generateId('cat'), name });
    this.store.update(data => ({
      ...data,
      categories: [...data.categories, category],
    }));
    return category;
  }

  setCategoryEnabled(id: string, isEnabled: boolean): Category {
    let updated: Category | undefined;
    this.store.update(data => ({
      ...data,
      categories: data.categories.map(c => {
        if (c.id !== id) return c;
        updated = { ...c, isEnabled };
        return updated;
      }),
    }));

    if (!updated) throw new Error(`Category not found: ${id}`);
    return updated;
  }

  /** Removes the category; its rules become uncategorized (global). */
  removeCategory(id: string): void {
    this.requireCategory(id);
    this.store.update(data => ({
      categories: data.categories.filter(c => c.id !== id),
      rules: data.rules.map(r => {
        if (r.categoryId !== id) return r;
        const { categoryId: _removed, ...rest } = r;
        return rest;
      }),
    }));
  }

  getCategory(id: string): Category | undefined {
    return this.store.read().categories.find(c => c.id === id);
  }

  listCategories(): Category[] {
    return this.store.read().categories;
  }

  // ── Internals ───────────────────────────────────────────────

  private insertStored(stored: StoredRule): void {
    this.store.update(data => {
      if (data.rules.some(r => r.id === stored.id)) {
        throw new Error(`Rule already exists: ${stored.id}`);
      }
      return { ...data, rules: [...data.rules, stored] };
    });
  }

  private requireCategory(id: string): Category {
    const category = this.getCategory(id);
    if (!category) throw new Error(`Category not found: ${id}`);
    return category;
  }
}

function sortOrderAfter(rules: readonly StoredRule[]): number {
  return rules.reduce((max, r) => Math.max(max, r.sortOrder + 1), 0);
}
