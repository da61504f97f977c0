import { z } from 'zod';
import { JsonStore } from './storage.js';
import { type ActivityRecord, ActivityRecordSchema, type ActivityType } from './types.js';
import { extensionOf, generateId, now } from './utils.js';

const ActivityFileSchema = z.object({
  activities: z.array(ActivityRecordSchema).default([]),
});
type ActivityData = z.infer<typeof ActivityFileSchema>;

/** Oldest records are dropped past this many. */
export const MAX_ACTIVITIES = 5000;

export interface AppendActivityInput {
  type: ActivityType;
  fileName: string;
  details?: string;
  fileExtension?: string;
  timestamp?: string;
}

/** Append-only log of what happened to files; the learner's input. */
export class ActivityStore {
  private store: JsonStore<ActivityData>;

  constructor(root: string) {
    this.store = new JsonStore(root, 'activity.json', ActivityFileSchema, { activities: [] });
  }

  append(input: AppendActivityInput): ActivityRecord {
    const fileExtension = input.fileExtension ?? extensionOf(input.fileName);
    const record = ActivityRecordSchema.parse({
      id: generateId('act'),
      type: input.type,
      fileName: input.fileName,
      ...(fileExtension ? { fileExtension } : {}),
      details: input.details ?? '',
      timestamp: input.timestamp ?? now(),
    });

    this.store.update(data => ({
      activities: [...data.activities, record].slice(-MAX_ACTIVITIES),
    }));

    return record;
  }

  /** Newest first. */
  getRecent(count = 50): ActivityRecord[] {
    return this.store.read().activities.slice(-count).reverse();
  }

  /** Oldest first, the order they were recorded in. */
  getAll(): ActivityRecord[] {
    return this.store.read().activities.slice();
  }
}
