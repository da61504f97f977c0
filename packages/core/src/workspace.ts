import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { ActivityStore } from './activity.js';
import { type LearnerConfig, type LearnerConfigInput, LearnerConfigSchema, resolveLearnerConfig } from './learning/config.js';
import { PatternStore } from './pattern-store.js';
import { RuleStore } from './rule-store.js';
import { JsonStore } from './storage.js';
import { WORKSPACE_DIR } from './types.js';
import { now } from './utils.js';

export const WorkspaceConfigSchema = z.object({
  name: z.string().min(1),
  version: z.string().default('0.1.0'),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  /** Overrides merged over the learner defaults. */
  learner: LearnerConfigSchema.partial().default({}),
});
export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>;

const ConfigFileSchema = z.object({ config: WorkspaceConfigSchema });
type ConfigData = z.infer<typeof ConfigFileSchema>;

function configStore(root: string, fallback: WorkspaceConfig): JsonStore<ConfigData> {
  return new JsonStore(root, 'config.json', ConfigFileSchema, { config: fallback });
}

/** A directory with a `.filewise/` folder holding its rules, patterns and activity. */
export class Workspace {
  readonly root: string;
  readonly dataDir: string;
  readonly rules: RuleStore;
  readonly patterns: PatternStore;
  readonly activity: ActivityStore;
  private _config: WorkspaceConfig;

  private constructor(root: string, config: WorkspaceConfig) {
    this.root = root;
    this.dataDir = join(root, WORKSPACE_DIR);
    this._config = config;
    this.rules = new RuleStore(root);
    this.patterns = new PatternStore(root);
    this.activity = new ActivityStore(root);
  }

  static init(root: string, name: string): Workspace {
    const dataDir = join(root, WORKSPACE_DIR);
    if (existsSync(dataDir)) {
      throw new Error(`Workspace already exists at ${root}`);
    }
    mkdirSync(dataDir, { recursive: true });

    const timestamp = now();
    const config = WorkspaceConfigSchema.parse({ name, createdAt: timestamp, updatedAt: timestamp });
    configStore(root, config).write({ config });

    return new Workspace(root, config);
  }

  static open(root: string): Workspace {
    if (!existsSync(join(root, WORKSPACE_DIR))) {
      throw new Error(`No filewise workspace found at ${root}`);
    }

    const timestamp = now();
    const fallback = WorkspaceConfigSchema.parse({ name: 'unknown', createdAt: timestamp, updatedAt: timestamp });
    const { config } = configStore(root, fallback).read();
    return new Workspace(root, config);
  }

  get config(): WorkspaceConfig {
    return this._config;
  }

  /** Learner thresholds with this workspace's overrides applied. */
  get learnerConfig(): LearnerConfig {
    return resolveLearnerConfig(this._config.learner);
  }

  updateConfig(updates: Partial<Pick<WorkspaceConfig, 'name'>> & { learner?: LearnerConfigInput }): WorkspaceConfig {
    const next = WorkspaceConfigSchema.parse({
      ...this._config,
      ...updates,
      learner: { ...this._config.learner, ...updates.learner },
      updatedAt: now(),
    });
    configStore(this.root, next).write({ config: next });
    this._config = next;
    return next;
  }
}
