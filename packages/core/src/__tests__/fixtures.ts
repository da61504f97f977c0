import type {
  ActivityRecord,
  ActivityType,
  Category,
  FileItem,
  FolderDestination,
  LearnedPattern,
  ResolvedDestination,
  Rule,
} from '../types.js';
import { folderPlaceholder } from '../types.js';
import type { DestinationResolver } from '../engine/types.js';
import { extensionOf } from '../utils.js';

export function makeFile(name: string, overrides: Partial<FileItem> = {}): FileItem {
  return {
    name,
    path: `/Users/test/Downloads/${name}`,
    extension: extensionOf(name),
    creationDate: '2024-01-01T00:00:00.000Z',
    modificationDate: '2024-01-01T00:00:00.000Z',
    lastAccessedDate: '2024-01-01T00:00:00.000Z',
    sizeInBytes: 1000,
    location: 'downloads',
    status: 'pending',
    rejectionCount: 0,
    ...overrides,
  };
}

export function makeRule(id: string, overrides: Partial<Rule> = {}): Rule {
  return {
    id,
    name: `Rule ${id}`,
    conditions: [{ type: 'extensionEquals', value: 'pdf' }],
    combinator: 'single',
    exclusions: [],
    action: 'move',
    destination: folderPlaceholder('Documents'),
    isEnabled: true,
    sortOrder: 0,
    creationDate: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeCategory(id: string, overrides: Partial<Category> = {}): Category {
  return {
    id,
    name: `Category ${id}`,
    isEnabled: true,
    scope: { kind: 'global' },
    ...overrides,
  };
}

export function makeActivity(
  type: ActivityType,
  fileName: string,
  details: string,
  timestamp = '2024-01-08T10:00:00.000Z',
): ActivityRecord {
  return {
    id: `act_${fileName}_${timestamp}`,
    type,
    fileName,
    fileExtension: extensionOf(fileName),
    details,
    timestamp,
  };
}

export function makePattern(overrides: Partial<LearnedPattern> = {}): LearnedPattern {
  return {
    id: 'pat_test',
    description: 'Move PDF files to Documents',
    fileExtension: 'pdf',
    destinationPath: 'Documents',
    conditions: [{ type: 'extensionEquals', value: 'pdf' }],
    combinator: 'single',
    occurrenceCount: 3,
    confidenceScore: 0.8,
    lastSeenDate: '2024-01-08T10:00:00.000Z',
    isNegative: false,
    rejectionCount: 0,
    timeCategory: 'anyTime',
    temporalContexts: [],
    keywords: [],
    convertedToRule: false,
    ...overrides,
  };
}

/** Resolves only the listed display paths, to `/resolved/<path>`. Counts calls. */
export class FakeResolver implements DestinationResolver {
  calls: string[] = [];
  private readonly known: Set<string>;

  constructor(known: readonly string[]) {
    this.known = new Set(known);
  }

  resolve(destination: FolderDestination): ResolvedDestination | null {
    this.calls.push(destination.displayPath);
    if (!this.known.has(destination.displayPath)) return null;
    return {
      kind: 'folder',
      displayPath: destination.displayPath,
      resolution: { state: 'resolved', token: `/resolved/${destination.displayPath}` },
    };
  }
}

export function resolvedFolder(displayPath: string): ResolvedDestination {
  return {
    kind: 'folder',
    displayPath,
    resolution: { state: 'resolved', token: `/resolved/${displayPath}` },
  };
}
