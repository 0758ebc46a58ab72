import { describe, expect, it } from 'vitest';

import { formatChars, formatMs, stripAnsi } from '../src/cli/ui/format.js';
import { InteractiveRenderer, QuietRenderer, summaryBlock } from '../src/cli/ui/renderer.js';
import { captureStream } from './zip-fixture.js';

describe('summaryBlock', () => {
  it('labels the summary and pads it with blank lines', () => {
    expect(summaryBlock('plan.txt', '1. full scan on t')).toBe('Summary for plan.txt:\n\n1. full scan on t\n\n\n');
  });
});

describe('InteractiveRenderer', () => {
  it('writes summaries to stdout and progress to stderr', () => {
    const out = captureStream();
    const err = captureStream();
    const r = new InteractiveRenderer({ stdout: out.stream, stderr: err.stream });

    const spinner = r.fileStart('plan.txt', 1, 3);
    spinner.succeed('plan.txt analyzed');
    r.fileSummary('plan.txt', 'add an index');

    expect(stripAnsi(out.text())).toBe('Summary for plan.txt:\n\nadd an index\n\n\n');
    expect(stripAnsi(err.text())).toBe('  🔍 Analyzing file 1 of 3: plan.txt...\n  ✔ plan.txt analyzed\n');
  });

  it('lists selected files with truncation details', () => {
    const err = captureStream();
    const r = new InteractiveRenderer({ stdout: captureStream().stream, stderr: err.stream });

    r.selection(
      [
        { name: 'schema.sql', content: 'x', truncated: false, originalLength: 1 },
        { name: 'plan.txt', content: 'y', truncated: true, originalLength: 12480 },
      ],
      8000,
    );

    const text = stripAnsi(err.text());
    expect(text).toContain('schema.sql      1 char');
    expect(text).toContain('plan.txt        12,480 chars → truncated to 8,000 chars');
  });

  it('prints errors with a tip', () => {
    const err = captureStream();
    const r = new InteractiveRenderer({ stdout: captureStream().stream, stderr: err.stream });

    r.error('Missing API key', 'OPENAI_API_KEY not set', 'Export OPENAI_API_KEY.');

    expect(stripAnsi(err.text())).toBe(
      '\n  ERROR  Missing API key\n\n  OPENAI_API_KEY not set\n\n  Tip: Export OPENAI_API_KEY.\n\n',
    );
  });
});

describe('QuietRenderer', () => {
  it('emits JSON events on stderr', () => {
    const err = captureStream();
    const r = new QuietRenderer({ stdout: captureStream().stream, stderr: err.stream });

    r.fileFailed('statement.sql', 'Response contained no choices');

    expect(JSON.parse(err.text())).toMatchObject({
      type: 'file_failed',
      name: 'statement.sql',
      reason: 'Response contained no choices',
    });
  });
});

describe('format helpers', () => {
  it('formats durations', () => {
    expect(formatMs(250)).toBe('250ms');
    expect(formatMs(3200)).toBe('3.2s');
    expect(formatMs(102_000)).toBe('1m 42s');
  });

  it('formats character counts', () => {
    expect(formatChars(1)).toBe('1 char');
    expect(formatChars(8000)).toBe('8,000 chars');
  });
});
