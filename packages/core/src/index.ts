export * from './types.js';
export * from './engine/index.js';
export * from './learning/index.js';
export * from './overlap/index.js';
export { applySuggestions } from './pipeline.js';
export type { SuggestionOptions, PredictionSource } from './pipeline.js';
export { FILE_KINDS, DEFAULT_VOCABULARY, extensionHasKind } from './lookup.js';
export { JsonStore } from './storage.js';
export { ActivityStore, MAX_ACTIVITIES } from './activity.js';
export type { AppendActivityInput } from './activity.js';
export { RuleStore } from './rule-store.js';
export type { NewRuleInput, RuleUpdate, NewCategoryInput } from './rule-store.js';
export { PatternStore } from './pattern-store.js';
export { Workspace, WorkspaceConfigSchema } from './workspace.js';
export type { WorkspaceConfig } from './workspace.js';
export { generateId, stableId, now, formatBytes, clamp01, extensionOf } from './utils.js';
