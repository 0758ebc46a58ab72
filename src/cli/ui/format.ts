import { theme, INDENT, RULE_WIDTH } from './theme.js';

// ── Time Formatting ─────────────────────────────────────────────────────────

/**
 * Format milliseconds into a compact human-readable string.
 * Examples: "124ms", "3.2s", "1m 42s"
 */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) return String(ms);
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;
  const m = Math.floor(totalSeconds / 60);
  const s = Math.round(totalSeconds % 60);
  return s > 0 ? `${m}m ${s}s` : `${m}m`;
}

/** Character counts with a thousands separator: 12,480 chars. */
export function formatChars(n: number): string {
  return `${n.toLocaleString('en-US')} char${n === 1 ? '' : 's'}`;
}

// ── Table Alignment ─────────────────────────────────────────────────────────

/**
 * Pad a string to a fixed width (right-pad with spaces).
 */
export function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

// ── Horizontal Rules ────────────────────────────────────────────────────────

/**
 * A section banner:  ── Summary for plan.txt ──────────
 */
export function sectionBanner(label: string, width: number = RULE_WIDTH): string {
  const prefix = '── ';
  const suffixLen = Math.max(4, width - prefix.length - label.length - 1);
  return theme.dim(prefix) + theme.bold(label) + theme.dim(' ' + '─'.repeat(suffixLen));
}

// ── Box Drawing ─────────────────────────────────────────────────────────────

/**
 * Draw a box with rounded corners around content lines.
 *
 * ```
 * ╭─── Title ─────────────────────────╮
 * │                                    │
 * │  content line 1                    │
 * │                                    │
 * ╰────────────────────────────────────╯
 * ```
 */
export function drawBox(title: string, lines: string[], width: number = RULE_WIDTH): string {
  const style = theme.box.border;

  const titleText = ` ${title} `;
  const topFillLen = Math.max(0, width - 2 - 3 - titleText.length);
  const topLine = style('╭───') + theme.box.title(titleText) + style('─'.repeat(topFillLen) + '╮');
  const bottomLine = style('╰' + '─'.repeat(width - 2) + '╯');
  const emptyLine = style('│') + ' '.repeat(width - 2) + style('│');

  const contentLines = lines.map((line) => {
    // Strip ANSI for length calculation
    const padLen = Math.max(0, width - 4 - stripAnsi(line).length);
    return style('│') + '  ' + line + ' '.repeat(padLen) + style(' │');
  });

  return [topLine, emptyLine, ...contentLines, emptyLine, bottomLine].join('\n');
}

// ── Key-Value Formatting ────────────────────────────────────────────────────

/**
 * Format a label-value pair with alignment:
 * "  Files         3 analyzed"
 */
export function keyValue(label: string, value: string, labelWidth: number = 14): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Strip ANSI escape codes from a string (for width calculations).
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
