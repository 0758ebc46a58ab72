import type { AnalysisMode } from '../../core/analyzer.js';
import type { SelectedFile } from '../../core/bundle/types.js';
import { theme, INDENT, RULE_WIDTH, FILE_LABEL_WIDTH } from './theme.js';
import { drawBox, formatChars, formatMs, keyValue, padRight, sectionBanner, stripAnsi } from './format.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * The Renderer is the single output coordinator for the CLI.
 * Summaries and dry-run prompts go to stdout; everything else to stderr.
 * - InteractiveRenderer for rich TTY output (colors, spinners, boxes)
 * - QuietRenderer for JSON lines on stderr (--quiet mode)
 */
export interface Renderer {
  // ── Run ──
  runStart(info: { bundle: string; mode: AnalysisMode; model: string }): void;
  selection(files: SelectedFile[], maxChars: number): void;
  noRelevantFiles(roleNames: readonly string[]): void;

  // ── Per-File Activity ──
  fileStart(name: string, index: number, total: number): SpinnerHandle;
  fileSummary(name: string, summary: string): void;
  fileFailed(name: string, reason: string): void;
  promptPreview(name: string, prompt: string): void;

  // ── Completion ──
  runComplete(info: { succeeded: number; failed: number; durationMs: number }): void;

  // ── Errors ──
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;
}

export interface RendererStreams {
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

/** Plain block printed for every summary, regardless of renderer. */
export function summaryBlock(name: string, summary: string, heading: (s: string) => string = (s) => s): string {
  return `${heading(`Summary for ${name}:`)}\n\n${summary}\n\n\n`;
}

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private readonly out: NodeJS.WritableStream;
  private readonly err: NodeJS.WritableStream;

  constructor(streams: RendererStreams = {}) {
    this.out = streams.stdout ?? process.stdout;
    this.err = streams.stderr ?? process.stderr;
  }

  private writeln(msg: string = ''): void {
    this.err.write(msg + '\n');
  }

  runStart(info: { bundle: string; mode: AnalysisMode; model: string }): void {
    this.writeln();
    this.writeln(INDENT + sectionBanner('Statement bundle'));
    this.writeln();
    this.writeln(keyValue('Bundle', info.bundle));
    this.writeln(keyValue('Mode', info.mode));
    this.writeln(keyValue('Model', info.model));
    this.writeln();
  }

  selection(files: SelectedFile[], maxChars: number): void {
    const lines = files.map((f) => {
      const label = theme.role(f.name)(theme.bold(padRight(f.name, FILE_LABEL_WIDTH)));
      const size = f.truncated
        ? theme.warning(`${formatChars(f.originalLength)} → truncated to ${formatChars(maxChars)}`)
        : theme.dim(formatChars(f.originalLength));
      return `${label}${size}`;
    });
    const width = Math.max(RULE_WIDTH, ...lines.map((l) => stripAnsi(l).length + 6));
    this.writeln(drawBox('Selected files', lines, width));
    this.writeln();
  }

  noRelevantFiles(roleNames: readonly string[]): void {
    this.warn(`No recognized files in bundle (looked for ${roleNames.join(', ')})`);
  }

  fileStart(name: string, index: number, total: number): SpinnerHandle {
    return startSpinner(`🔍 Analyzing file ${index} of ${total}: ${name}...`, this.err);
  }

  fileSummary(name: string, summary: string): void {
    this.out.write(summaryBlock(name, summary, theme.bold));
  }

  fileFailed(name: string, reason: string): void {
    this.writeln(`${INDENT}${theme.cross} ${theme.bold(name)} ${theme.error('FAILED')} — ${reason}`);
  }

  promptPreview(name: string, prompt: string): void {
    this.out.write(`${theme.bold(`Prompt for ${name}:`)}\n\n${prompt}\n\n`);
  }

  runComplete(info: { succeeded: number; failed: number; durationMs: number }): void {
    this.writeln(INDENT + sectionBanner('Complete'));
    this.writeln();
    this.writeln(keyValue('Analyzed', String(info.succeeded)));
    if (info.failed > 0) this.writeln(keyValue('Failed', theme.error(String(info.failed))));
    this.writeln(keyValue('Duration', formatMs(info.durationMs)));
    this.writeln();
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    this.writeln();
    for (const line of details.split('\n')) {
      this.writeln(`${INDENT}${line}`);
    }
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }
}

// ── Quiet Renderer (JSON Lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private readonly out: NodeJS.WritableStream;
  private readonly err: NodeJS.WritableStream;

  constructor(streams: RendererStreams = {}) {
    this.out = streams.stdout ?? process.stdout;
    this.err = streams.stderr ?? process.stderr;
  }

  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    this.err.write(JSON.stringify(event) + '\n');
  }

  runStart(info: { bundle: string; mode: AnalysisMode; model: string }): void {
    this.emit('run_start', { ...info });
  }

  selection(files: SelectedFile[], maxChars: number): void {
    this.emit('selection', {
      max_chars: maxChars,
      files: files.map((f) => ({ name: f.name, original_length: f.originalLength, truncated: f.truncated })),
    });
  }

  noRelevantFiles(roleNames: readonly string[]): void {
    this.emit('no_relevant_files', { roles: [...roleNames] });
  }

  fileStart(name: string, index: number, total: number): SpinnerHandle {
    this.emit('file_start', { name, index, total });
    return {
      succeed() { /* no-op */ },
      fail() { /* no-op */ },
    };
  }

  fileSummary(name: string, summary: string): void {
    this.emit('file_summary', { name, length: summary.length });
    this.out.write(summaryBlock(name, summary));
  }

  fileFailed(name: string, reason: string): void {
    this.emit('file_failed', { name, reason });
  }

  promptPreview(name: string, prompt: string): void {
    this.emit('prompt_preview', { name, length: prompt.length });
    this.out.write(`Prompt for ${name}:\n\n${prompt}\n\n`);
  }

  runComplete(info: { succeeded: number; failed: number; durationMs: number }): void {
    this.emit('run_complete', { succeeded: info.succeeded, failed: info.failed, duration_ms: info.durationMs });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }
}

// ── Factory ─────────────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/**
 * Get the global Renderer instance.
 * Defaults to InteractiveRenderer; use `setRenderer` to override.
 */
export function getRenderer(): Renderer {
  if (!_instance) {
    _instance = process.env.BUNDLESCOPE_QUIET === '1'
      ? new QuietRenderer()
      : new InteractiveRenderer();
  }
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing).
 */
export function setRenderer(renderer: Renderer | null): void {
  _instance = renderer;
}

/**
 * Create the appropriate renderer based on flags.
 */
export function createRenderer(opts: { quiet?: boolean } & RendererStreams = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer(opts) : new InteractiveRenderer(opts);
  _instance = r;
  return r;
}
