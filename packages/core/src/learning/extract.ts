/**
 * Parsing of free-text activity details. Unparsable text yields "".
 */

import type { ActivityRecord } from '../types.js';
import { extensionOf } from '../utils.js';

const DESTINATION_MARKERS = ['Moved to ', 'Organized to ', 'to '];
const REJECTION_MARKERS = ['Skipped suggestion for ', 'Rejected ', 'Skipped: '];

function textAfterMarker(details: string, markers: readonly string[]): string {
  const lower = details.toLowerCase();
  for (const marker of markers) {
    const at = lower.indexOf(marker.toLowerCase());
    if (at >= 0) return details.slice(at + marker.length).trim();
  }
  return '';
}

/** "Moved to Documents/Finance" → "Documents/Finance" */
export function extractDestination(details: string): string {
  return textAfterMarker(details, DESTINATION_MARKERS);
}

/** "Skipped suggestion for Desktop/Temp" → "Desktop/Temp" */
export function extractRejectedDestination(details: string): string {
  return textAfterMarker(details, REJECTION_MARKERS);
}

export function activityExtension(activity: Pick<ActivityRecord, 'fileExtension' | 'fileName'>): string {
  const ext = activity.fileExtension?.trim().replace(/^\./, '').toLowerCase();
  return ext ? ext : extensionOf(activity.fileName);
}

const MAX_PATH_DISPLAY = 35;

/** Shortens a path for pattern descriptions: "~/…" for home, "…/a/b" when long. */
export function abbreviatePath(path: string, homeDir?: string): string {
  let result = path;
  if (homeDir && result.startsWith(homeDir)) {
    result = `~${result.slice(homeDir.length)}`;
  }
  if (result.length > MAX_PATH_DISPLAY) {
    const parts = result.split('/').filter(p => p.length > 0);
    if (parts.length > 2) return `…/${parts.slice(-2).join('/')}`;
  }
  return result;
}

/** Last path segment, for rule names. */
export function folderName(path: string): string {
  const parts = path.split(/[\\/]/).filter(p => p.length > 0);
  return parts.length > 0 ? parts[parts.length - 1] : path;
}
