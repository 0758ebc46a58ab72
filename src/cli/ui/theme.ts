import chalk, { type ChalkInstance } from 'chalk';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  warning: chalk.yellow,
  error: chalk.red,

  // Symbols
  cross: chalk.red('✖'),

  // Bundle file roles get a color each in the selection listing.
  role: (name: string): ChalkInstance => {
    const map: Record<string, ChalkInstance> = {
      'schema.sql': chalk.blue,
      'statement.sql': chalk.cyan,
      'plan.txt': chalk.yellow,
      'env.sql': chalk.magenta,
    };
    return map[name] ?? chalk.white;
  },

  box: {
    border: chalk.cyan,
    title: chalk.bold.cyan,
  },
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules and box drawing. */
export const RULE_WIDTH = 56;

/** Column width for file names in the selection listing. */
export const FILE_LABEL_WIDTH = 16;
