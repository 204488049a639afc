/**
 * Inspection of the sync program's own config.json
 *
 * The launcher never uses these values; it only reports whether the file
 * the sync program will read is present and complete. Token values are
 * never returned.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Keys the sync program reads unconditionally
 */
export const REQUIRED_SYNC_KEYS = ['server_url', 'api_token', 'todoist_api_token'] as const;

export interface SyncConfigStatus {
  /** Absolute path checked */
  path: string;
  present: boolean;
  /** Whether the file parsed as a JSON object */
  valid: boolean;
  /** Required keys that are absent or empty */
  missingKeys: string[];
  /** Value of the optional "debug" flag */
  debug: boolean;
  error?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check the sync program's config file
 */
export function inspectSyncConfig(root: string, file: string): SyncConfigStatus {
  const path = resolve(root, file);
  const status: SyncConfigStatus = {
    path,
    present: false,
    valid: false,
    missingKeys: [...REQUIRED_SYNC_KEYS],
    debug: false,
  };

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch {
    return status;
  }
  status.present = true;

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    status.error = `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`;
    return status;
  }

  if (!isRecord(parsed)) {
    status.error = 'Expected a JSON object';
    return status;
  }

  const data = parsed;
  status.valid = true;
  status.missingKeys = REQUIRED_SYNC_KEYS.filter((key) => {
    const value = data[key];
    return typeof value !== 'string' || value.trim().length === 0;
  });
  status.debug = data.debug === true;

  return status;
}
