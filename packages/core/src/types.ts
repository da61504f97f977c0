import { z } from 'zod';

// ── Constants ───────────────────────────────────────────────────

export const WORKSPACE_DIR = '.filewise';

// ── Locations ───────────────────────────────────────────────────

export const LocationKind = z.enum([
  'home',
  'desktop',
  'downloads',
  'documents',
  'pictures',
  'music',
  'custom',
  'unknown',
]);
export type LocationKind = z.infer<typeof LocationKind>;

// ── Conditions ──────────────────────────────────────────────────

/**
 * One atomic test against a file. `negated` wraps any condition, to any depth.
 * `timeOfDay` and `dayOfWeek` test the evaluation clock rather than the file;
 * the temporal learning pass produces them.
 */
export type Condition =
  | { type: 'extensionEquals'; value: string }
  | { type: 'nameStartsWith'; value: string }
  | { type: 'nameContains'; value: string }
  | { type: 'nameEndsWith'; value: string }
  | { type: 'olderThan'; days: number; extension?: string | undefined }
  | { type: 'modifiedOlderThan'; days: number }
  | { type: 'accessedOlderThan'; days: number }
  | { type: 'largerThan'; bytes: number }
  | { type: 'kindEquals'; kind: string }
  | { type: 'fromLocation'; location: LocationKind }
  | { type: 'timeOfDay'; startHour: number; endHour: number }
  | { type: 'dayOfWeek'; days: number[] }
  | { type: 'negated'; condition: Condition };

export type ConditionType = Condition['type'];

export const ConditionSchema: z.ZodType<Condition> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('extensionEquals'), value: z.string() }),
    z.object({ type: z.literal('nameStartsWith'), value: z.string() }),
    z.object({ type: z.literal('nameContains'), value: z.string() }),
    z.object({ type: z.literal('nameEndsWith'), value: z.string() }),
    z.object({
      type: z.literal('olderThan'),
      days: z.number().int(),
      extension: z.string().optional(),
    }),
    z.object({ type: z.literal('modifiedOlderThan'), days: z.number().int() }),
    z.object({ type: z.literal('accessedOlderThan'), days: z.number().int() }),
    z.object({ type: z.literal('largerThan'), bytes: z.number().int().nonnegative() }),
    z.object({ type: z.literal('kindEquals'), kind: z.string() }),
    z.object({ type: z.literal('fromLocation'), location: LocationKind }),
    z.object({
      type: z.literal('timeOfDay'),
      startHour: z.number().int().min(0).max(24),
      endHour: z.number().int().min(0).max(24),
    }),
    z.object({ type: z.literal('dayOfWeek'), days: z.array(z.number().int().min(1).max(7)) }),
    z.object({ type: z.literal('negated'), condition: ConditionSchema }),
  ]),
);

export const Combinator = z.enum(['single', 'and', 'or']);
export type Combinator = z.infer<typeof Combinator>;

// ── Destinations ────────────────────────────────────────────────

export const DestinationResolution = z.discriminatedUnion('state', [
  z.object({ state: z.literal('unresolved') }),
  z.object({ state: z.literal('resolved'), token: z.string().min(1) }),
]);
export type DestinationResolution = z.infer<typeof DestinationResolution>;

export const FolderDestinationSchema = z.object({
  kind: z.literal('folder'),
  displayPath: z.string().min(1),
  resolution: DestinationResolution,
});
export type FolderDestination = z.infer<typeof FolderDestinationSchema>;

export const DestinationSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('trash') }),
  FolderDestinationSchema,
]);
export type Destination = z.infer<typeof DestinationSchema>;

export type ResolvedDestination = FolderDestination & {
  resolution: { state: 'resolved'; token: string };
};

export function folderPlaceholder(displayPath: string): FolderDestination {
  return { kind: 'folder', displayPath, resolution: { state: 'unresolved' } };
}

export function isResolved(destination: FolderDestination): destination is ResolvedDestination {
  return destination.resolution.state === 'resolved';
}

// ── Categories ──────────────────────────────────────────────────

export const ScopedFolderSchema = z.object({
  path: z.string().min(1),
  displayName: z.string(),
});
export type ScopedFolder = z.infer<typeof ScopedFolderSchema>;

export const CategoryScopeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('global') }),
  z.object({ kind: z.literal('folders'), folders: z.array(ScopedFolderSchema) }),
]);
export type CategoryScope = z.infer<typeof CategoryScopeSchema>;

export const CategorySchema = z.object({
  id: z.string(),
  name: z.string().min(1),
  isEnabled: z.boolean().default(true),
  scope: CategoryScopeSchema.default({ kind: 'global' }),
});
export type Category = z.infer<typeof CategorySchema>;

// ── Rules ───────────────────────────────────────────────────────

export const RuleAction = z.enum(['move', 'copy', 'delete']);
export type RuleAction = z.infer<typeof RuleAction>;

export const RuleSchema = z.object({
  id: z.string(),
  name: z.string().min(1),
  conditions: z.array(ConditionSchema),
  combinator: Combinator.default('single'),
  exclusions: z.array(ConditionSchema).default([]),
  action: RuleAction.default('move'),
  destination: DestinationSchema.optional(),
  category: CategorySchema.optional(),
  isEnabled: z.boolean().default(true),
  sortOrder: z.number().int().default(0),
  creationDate: z.string().datetime(),
});
export type Rule = z.infer<typeof RuleSchema>;

/** Persisted form: the category is stored once and referenced by id. */
export const StoredRuleSchema = RuleSchema.omit({ category: true }).extend({
  categoryId: z.string().optional(),
});
export type StoredRule = z.infer<typeof StoredRuleSchema>;

// ── Files ───────────────────────────────────────────────────────

export const FileStatus = z.enum(['pending', 'ready', 'completed', 'skipped']);
export type FileStatus = z.infer<typeof FileStatus>;

export const SuggestionSource = z.enum(['rule', 'pattern', 'prediction']);
export type SuggestionSource = z.infer<typeof SuggestionSource>;

export const FileItemSchema = z.object({
  name: z.string(),
  path: z.string(),
  extension: z.string(),
  creationDate: z.string().datetime(),
  modificationDate: z.string().datetime(),
  lastAccessedDate: z.string().datetime(),
  sizeInBytes: z.number().int().nonnegative(),
  location: LocationKind.default('unknown'),
  // Decision outputs, owned by the classification step
  destination: DestinationSchema.optional(),
  status: FileStatus.default('pending'),
  matchReason: z.string().optional(),
  confidenceScore: z.number().min(0).max(1).optional(),
  matchedRuleId: z.string().optional(),
  suggestionSource: SuggestionSource.optional(),
  // Rejection tracking
  rejectedDestination: z.string().optional(),
  rejectionCount: z.number().int().nonnegative().default(0),
});
export type FileItem = z.infer<typeof FileItemSchema>;

// ── Activity ────────────────────────────────────────────────────

export const ActivityType = z.enum([
  'organized',
  'moved',
  'skipped',
  'deleted',
  'ruleApplied',
  'ruleCreated',
  'patternAccepted',
  'patternRejected',
]);
export type ActivityType = z.infer<typeof ActivityType>;

export const ActivityRecordSchema = z.object({
  id: z.string(),
  type: ActivityType,
  fileName: z.string(),
  fileExtension: z.string().optional(),
  details: z.string().default(''),
  timestamp: z.string().datetime(),
});
export type ActivityRecord = z.infer<typeof ActivityRecordSchema>;

// ── Learned Patterns ────────────────────────────────────────────

export const TimeCategory = z.enum(['workHours', 'mornings', 'evenings', 'weekends', 'anyTime']);
export type TimeCategory = z.infer<typeof TimeCategory>;

export const TemporalContextSchema = z.object({
  hourOfDay: z.number().int().min(0).max(23),
  dayOfWeek: z.number().int().min(1).max(7), // 1 = Sunday
  isWorkHours: z.boolean(),
});
export type TemporalContext = z.infer<typeof TemporalContextSchema>;

export const LearnedPatternSchema = z.object({
  id: z.string(),
  description: z.string(),
  fileExtension: z.string(),
  destinationPath: z.string(),
  conditions: z.array(ConditionSchema),
  combinator: Combinator.default('single'),
  occurrenceCount: z.number().int().nonnegative(),
  confidenceScore: z.number().min(0).max(1),
  lastSeenDate: z.string().datetime(),
  isNegative: z.boolean().default(false),
  rejectionCount: z.number().int().nonnegative().default(0),
  timeCategory: TimeCategory.default('anyTime'),
  temporalContexts: z.array(TemporalContextSchema).default([]),
  keywords: z.array(z.string()).default([]),
  convertedToRule: z.boolean().default(false),
  convertedRuleId: z.string().optional(),
});
export type LearnedPattern = z.infer<typeof LearnedPatternSchema>;

// ── External predictions ────────────────────────────────────────

/** A prediction from an outside model, in the same shape as a rule match. */
export interface ExternalPrediction {
  destination: Destination;
  confidence: number;
  explanation: string;
}
