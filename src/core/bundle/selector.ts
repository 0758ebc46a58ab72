import { ConfigError } from '../errors.js';
import type { ArchiveContents, RoleTable, SelectedFile } from './types.js';

export const DEFAULT_MAX_CHARS_PER_FILE = 8000;
export const TRUNCATION_MARKER = '\n... [truncated]';

export interface SelectionOptions {
  /** Per-file character limit before truncation. */
  maxChars?: number;
  /** Stop after this many matches. Unbounded when omitted. */
  maxFiles?: number;
}

/**
 * Pick the archive entries that match a role, in role-table order.
 *
 * Matching is an exact, case-sensitive comparison of the entry path with the
 * role name: `dir/plan.txt` is not `plan.txt`. Entries with no role are never
 * selected and an archive with no matches yields an empty list.
 */
export function selectRelevantFiles(
  contents: ArchiveContents,
  roles: RoleTable,
  opts: SelectionOptions = {},
): SelectedFile[] {
  const maxChars = opts.maxChars ?? DEFAULT_MAX_CHARS_PER_FILE;
  assertPositiveInt('maxChars', maxChars);
  if (opts.maxFiles !== undefined) assertPositiveInt('maxFiles', opts.maxFiles);

  const selected: SelectedFile[] = [];
  for (const role of roles.roles) {
    if (opts.maxFiles !== undefined && selected.length >= opts.maxFiles) break;

    const content = contents.get(role.name);
    if (content === undefined) continue;

    selected.push(truncateFile(role.name, content, maxChars));
  }
  return selected;
}

export function truncateFile(name: string, content: string, maxChars: number): SelectedFile {
  if (content.length <= maxChars) {
    return { name, content, truncated: false, originalLength: content.length };
  }
  // Don't split a surrogate pair at the cut.
  const end = isHighSurrogate(content.charCodeAt(maxChars - 1)) ? maxChars - 1 : maxChars;
  return {
    name,
    content: content.slice(0, end) + TRUNCATION_MARKER,
    truncated: true,
    originalLength: content.length,
  };
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function assertPositiveInt(label: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${label} must be a positive integer (got ${value})`);
  }
}
