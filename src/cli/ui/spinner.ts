import ora, { type Ora } from 'ora';

// ── TTY-Aware Spinner ───────────────────────────────────────────────────────
// Wraps `ora` with a consistent API. Falls back to static lines in non-TTY
// contexts (CI, piped output). Writes to stderr to keep stdout for summaries.

export interface SpinnerHandle {
  /** Stop with a success checkmark and message. */
  succeed(text?: string): void;
  /** Stop with a failure cross and message. */
  fail(text?: string): void;
}

/**
 * Create and start a spinner with the given text.
 * In non-TTY environments, or under --quiet, prints a static line instead.
 */
export function startSpinner(
  text: string,
  stream: NodeJS.WritableStream & { isTTY?: boolean } = process.stderr,
): SpinnerHandle {
  if (!stream.isTTY || process.env.BUNDLESCOPE_QUIET === '1') {
    stream.write(`  ${text}\n`);
    return {
      succeed(t?: string) {
        if (t) stream.write(`  ✔ ${t}\n`);
      },
      fail(t?: string) {
        if (t) stream.write(`  ✖ ${t}\n`);
      },
    };
  }

  // `ora` disables itself when CI=1 even on a real TTY; force it on.
  const spinner: Ora = ora({
    text,
    stream,
    spinner: 'dots',
    indent: 2,
    isEnabled: true,
  }).start();

  return {
    succeed(t?: string) {
      spinner.succeed(t ?? spinner.text);
    },
    fail(t?: string) {
      spinner.fail(t ?? spinner.text);
    },
  };
}
