import { basename, resolve } from 'node:path';

import { analyzeBundle, planBundleAnalysis, type AnalysisMode, type BundleAnalysis } from '../../core/analyzer.js';
import { readBundleFile } from '../../core/bundle/archive.js';
import { defaultRoleTable } from '../../core/bundle/roles.js';
import type { RoleTable, SelectedFile } from '../../core/bundle/types.js';
import { CompletionClient } from '../../core/completion/client.js';
import { API_KEY_ENV, type FetchLike } from '../../core/completion/types.js';
import { BundlescopeError, MissingCredentialError, UsageError, describeError } from '../../core/errors.js';
import type { Logger } from '../../utils/logger.js';
import { resolveRunConfig, type RunConfig } from '../config.js';
import type { SpinnerHandle } from '../ui/spinner.js';
import { getRenderer } from '../ui/renderer.js';

export interface AnalyzeCommandOptions {
  bundlePath: string;
  mode?: AnalysisMode;
  model?: string;
  maxChars?: number;
  maxFiles?: number;
  timeoutMs?: number;
  /** Print the prompts instead of calling the endpoint. */
  dryRun?: boolean;
  env?: Record<string, string | undefined>;
  roles?: RoleTable;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export interface AnalyzeCommandResult {
  ok: boolean;
  details?: unknown;
  analysis?: BundleAnalysis;
}

/**
 * `bundlescope <bundle>`: read the bundle, select the known files, ask the
 * completion endpoint about them and print the summaries.
 *
 * Config and credential problems are reported before the bundle is read.
 */
export async function runAnalyzeCommand(opts: AnalyzeCommandOptions): Promise<AnalyzeCommandResult> {
  const r = getRenderer();
  const started = Date.now();
  const mode = opts.mode ?? 'per-file';
  const roles = opts.roles ?? defaultRoleTable();
  const logger = opts.logger?.child('analyze');

  if (!opts.bundlePath.trim()) {
    return { ok: false, details: new UsageError('Missing bundle path') };
  }

  let config: RunConfig;
  try {
    config = resolveRunConfig(opts.env ?? process.env, {
      model: opts.model,
      maxChars: opts.maxChars,
      timeoutMs: opts.timeoutMs,
    });
  } catch (err) {
    return { ok: false, details: err };
  }

  if (!opts.dryRun && !config.completion.apiKey) {
    return { ok: false, details: new MissingCredentialError(config.completion.apiKeyVariable ?? API_KEY_ENV) };
  }

  const showSelection = (files: SelectedFile[]) => {
    if (files.length === 0) r.noRelevantFiles(roles.roles.map((role) => role.name));
    else r.selection(files, config.maxChars);
  };

  const bundlePath = resolve(opts.bundlePath);
  const bundleName = basename(bundlePath);

  try {
    const bytes = await readBundleFile(bundlePath);
    logger?.debug('bundle loaded', { path: bundlePath, bytes: bytes.byteLength });
    r.runStart({ bundle: bundlePath, mode, model: config.completion.model });

    const shared = {
      bytes,
      roles,
      mode,
      bundleName,
      maxChars: config.maxChars,
      maxFiles: opts.maxFiles,
      logger,
    };

    if (opts.dryRun) {
      const plan = await planBundleAnalysis(shared);
      showSelection(plan.selected);
      for (const p of plan.prompts) r.promptPreview(p.name, p.prompt);
      return { ok: true };
    }

    const client = new CompletionClient(config.completion, opts.fetchImpl, opts.logger?.child('completion'));
    const progress: { spinner?: SpinnerHandle } = {};
    let analysis: BundleAnalysis;
    try {
      analysis = await analyzeBundle({
        ...shared,
        completer: client,
        hooks: {
          onSelected: showSelection,
          onFileStart: (name, index, total) => {
            progress.spinner = r.fileStart(name, index, total);
          },
          onFileDone: (name, summary) => {
            progress.spinner?.succeed(`${name} analyzed`);
            progress.spinner = undefined;
            r.fileSummary(name, summary);
          },
          onFileError: (name, err) => {
            progress.spinner?.fail(`${name} failed`);
            progress.spinner = undefined;
            r.fileFailed(name, describeError(err));
          },
        },
      });
    } catch (err) {
      progress.spinner?.fail();
      throw err;
    }

    const succeeded = analysis.results.filter((res) => res.ok).length;
    const failed = analysis.results.length - succeeded;
    r.runComplete({ succeeded, failed, durationMs: Date.now() - started });

    if (failed > 0 && succeeded === 0) {
      return { ok: false, details: `All ${failed} file analyses failed`, analysis };
    }
    return { ok: true, analysis };
  } catch (err) {
    if (err instanceof BundlescopeError) return { ok: false, details: err };
    throw err;
  }
}
