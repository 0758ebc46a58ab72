import { Command, InvalidArgumentError, Option } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { ANALYSIS_MODES, type AnalysisMode } from '../core/analyzer.js';
import { BundlescopeError, type BundlescopeErrorCode } from '../core/errors.js';
import { createLogger } from '../utils/logger.js';
import { runAnalyzeCommand, type AnalyzeCommandOptions, type AnalyzeCommandResult } from './commands/analyze.js';
import { API_KEY_ENV } from '../core/completion/types.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

interface ProgramOptions {
  mode: AnalysisMode;
  model?: string;
  maxChars?: number;
  maxFiles?: number;
  timeout?: number;
  dryRun?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

const FAILURE_TITLES: Record<BundlescopeErrorCode, string> = {
  usage: 'Invalid usage',
  bundle_file: 'Failed to read file',
  archive_read: 'Failed to unzip',
  entry_read: 'Failed to unzip',
  config: 'Invalid configuration',
  missing_credential: 'Missing API key',
  transport: 'Request failed',
  upstream: 'API call failed',
  decode: 'Unexpected API response',
};

const FAILURE_TIPS: Partial<Record<BundlescopeErrorCode, string>> = {
  bundle_file: 'Pass the path of a statement bundle zip.',
  archive_read: 'Statement bundles are zip files; check the download completed.',
  missing_credential: `Export ${API_KEY_ENV}, or use --dry-run to preview the prompts.`,
  transport: 'Check network access to the endpoint, or raise BUNDLESCOPE_TIMEOUT_MS.',
};

export type AnalyzeRunner = (opts: AnalyzeCommandOptions) => Promise<AnalyzeCommandResult>;

export function buildProgram(run: AnalyzeRunner = runAnalyzeCommand): Command {
  const program = new Command();
  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('bundlescope')
    .description('Summarize query performance issues in a statement bundle with a chat-completion model')
    .version(version, '-v, --version')
    .argument('<bundle>', 'Path to the statement bundle zip')
    .addOption(new Option('--mode <mode>', 'One request per file, or one for the whole bundle').choices(ANALYSIS_MODES).default('per-file'))
    .option('--model <name>', 'Model name (default: $BUNDLESCOPE_MODEL or gpt-4)')
    .option('--max-chars <n>', 'Truncate each file after this many characters', parsePositiveInt)
    .option('--max-files <n>', 'Analyze at most this many files', parsePositiveInt)
    .option('--timeout <ms>', 'Request timeout in milliseconds', parsePositiveInt)
    .option('--dry-run', 'Print the prompts instead of sending them')
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines on stderr)')
    .action(async (bundle: string, opts: ProgramOptions) => {
      process.env.BUNDLESCOPE_QUIET = opts.quiet ? '1' : '0';
      createRenderer({ quiet: !!opts.quiet });
      const logger = createLogger({ verbose: !!opts.verbose, quiet: !!opts.quiet });

      const res = await run({
        bundlePath: bundle,
        mode: opts.mode,
        model: opts.model,
        maxChars: opts.maxChars,
        maxFiles: opts.maxFiles,
        timeoutMs: opts.timeout,
        dryRun: !!opts.dryRun,
        logger,
      });
      if (!res.ok) {
        renderFailure(res.details);
        process.exitCode = 1;
      }
    });

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  await buildProgram().parseAsync(argv);
}

export function renderFailure(details: unknown): void {
  const r = getRenderer();
  if (details instanceof BundlescopeError) {
    r.error(FAILURE_TITLES[details.code], details.message, FAILURE_TIPS[details.code]);
    return;
  }
  r.error('Analysis failed', String(details ?? 'unknown error'), 'Try running with --verbose for more details.');
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function detectVersionSync(): string | null {
  try {
    const startDir = dirname(fileURLToPath(import.meta.url));

    let current = startDir;
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const content = readFileSync(candidate, 'utf8');
        const parsed = JSON.parse(content) as { version?: unknown };
        return typeof parsed.version === 'string' ? parsed.version : null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}
