import { readBundleArchive } from './bundle/archive.js';
import { selectRelevantFiles } from './bundle/selector.js';
import type { RoleTable, SelectedFile } from './bundle/types.js';
import type { Completer } from './completion/types.js';
import { describeError } from './errors.js';
import { buildBundlePrompt, buildFilePrompt, DEFAULT_PROMPT_TEXTS, type PromptTexts } from './prompt/builder.js';
import type { Logger } from '../utils/logger.js';

export type AnalysisMode = 'per-file' | 'combined';

export const ANALYSIS_MODES: readonly AnalysisMode[] = ['per-file', 'combined'];

export type FileAnalysis =
  | { name: string; ok: true; summary: string }
  | { name: string; ok: false; error: unknown };

export interface BundleAnalysis {
  mode: AnalysisMode;
  selected: SelectedFile[];
  /** One entry per selected file in per-file mode; at most one in combined mode. */
  results: FileAnalysis[];
}

export interface AnalysisHooks {
  onSelected?(files: SelectedFile[]): void;
  onFileStart?(name: string, index: number, total: number): void;
  onFileDone?(name: string, summary: string): void;
  onFileError?(name: string, error: unknown): void;
}

export interface AnalyzeBundleOptions {
  bytes: Uint8Array;
  roles: RoleTable;
  completer: Completer;
  mode?: AnalysisMode;
  /** Label of the combined result; usually the bundle's file name. */
  bundleName?: string;
  maxChars?: number;
  maxFiles?: number;
  texts?: PromptTexts;
  hooks?: AnalysisHooks;
  logger?: Logger;
}

export interface PlannedPrompt {
  name: string;
  prompt: string;
}

/**
 * Read, select and build the prompts without calling the endpoint.
 * Archive errors propagate.
 */
export async function planBundleAnalysis(
  opts: Omit<AnalyzeBundleOptions, 'completer' | 'hooks'>,
): Promise<{ mode: AnalysisMode; selected: SelectedFile[]; prompts: PlannedPrompt[] }> {
  const mode = opts.mode ?? 'per-file';
  const texts = opts.texts ?? DEFAULT_PROMPT_TEXTS;

  const contents = await readBundleArchive(opts.bytes);
  opts.logger?.debug('archive read', { entries: [...contents.keys()].sort() });

  const selected = selectRelevantFiles(contents, opts.roles, { maxChars: opts.maxChars, maxFiles: opts.maxFiles });
  for (const f of selected) {
    if (f.truncated) opts.logger?.debug('file truncated', { name: f.name, originalLength: f.originalLength });
  }

  const prompts: PlannedPrompt[] =
    mode === 'combined'
      ? [{ name: opts.bundleName ?? 'bundle', prompt: buildBundlePrompt(selected, texts) }]
      : selected.map((file) => ({ name: file.name, prompt: buildFilePrompt(file, opts.roles, texts) }));

  return { mode, selected, prompts };
}

/**
 * Run the whole pipeline: archive → selection → prompt(s) → completion.
 *
 * In per-file mode every selected file gets its own call; a failing call is
 * recorded and reported through `onFileError`, and the next file still runs.
 * In combined mode the single call's failure is thrown. With no selected
 * files, combined mode still sends the preamble-only prompt and per-file mode
 * sends nothing.
 */
export async function analyzeBundle(opts: AnalyzeBundleOptions): Promise<BundleAnalysis> {
  const { hooks, completer, logger } = opts;
  const { mode, selected, prompts } = await planBundleAnalysis(opts);
  hooks?.onSelected?.(selected);
  logger?.debug('files selected', { mode, files: selected.map((f) => f.name) });

  const results: FileAnalysis[] = [];
  for (const [i, planned] of prompts.entries()) {
    hooks?.onFileStart?.(planned.name, i + 1, prompts.length);
    let summary: string;
    try {
      summary = await completer.complete(planned.prompt);
    } catch (err) {
      if (mode === 'combined') throw err;
      logger?.debug('file analysis failed', { name: planned.name, error: describeError(err) });
      results.push({ name: planned.name, ok: false, error: err });
      hooks?.onFileError?.(planned.name, err);
      continue;
    }
    // Hook failures are not completion failures; they propagate.
    results.push({ name: planned.name, ok: true, summary });
    hooks?.onFileDone?.(planned.name, summary);
  }
  return { mode, selected, results };
}
