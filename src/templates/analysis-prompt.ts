/**
 * Prompt texts sent to the completion endpoint.
 *
 * The per-file instructions are appended to BASE_INSTRUCTIONS when each bundle
 * file is analyzed on its own; BUNDLE_PREAMBLE introduces the combined prompt.
 */

export const SYSTEM_INSTRUCTION = 'You are a database performance expert.';

export const BASE_INSTRUCTIONS = [
  'You are a CockroachDB expert. Analyze the following file and identify',
  'inefficiencies and anti-patterns. List up to three things. Only include suggestions',
  'that you are highly confident in being relevant to query performance. Include only the list',
  'not any summary text beforehand.',
].join('\n');

export const ROLE_INSTRUCTIONS = {
  'schema.sql': [
    'Here is the schema file. Answer the following questions if relevant:',
    '* What are the most common anti-patterns in the schema?',
  ],
  'statement.sql': [
    'Here is the statement file. Answer the following questions if relevant:',
    '* What are the most common anti-patterns in the query?',
  ],
  'plan.txt': [
    'Here is the plan.txt file. Answer the following questions if relevant:',
    '* What are the slowest operations as shown in the plan?',
    '* What missing indexes might speed up this query?',
  ],
  'env.sql': [
    'Here is the environment file. Answer the following questions if relevant:',
    '* What version of CockroachDB is being used?',
    '* What non-default settings are configured?',
  ],
} as const satisfies Record<string, readonly string[]>;

export type DefaultRoleName = keyof typeof ROLE_INSTRUCTIONS;

export const BUNDLE_PREAMBLE = [
  'You are a CockroachDB expert reviewing a statement bundle: the schema, the query',
  'statement and its execution plan for a slow SQL query.',
  'Identify the issues most likely to hurt query performance:',
  '- the slowest operations in the plan',
  '- missing indexes that would speed up the query',
  '- anti-patterns in the query',
  '- anti-patterns in the schema',
  'Only include suggestions you are highly confident in. Include only the list, not any summary text beforehand.',
  '',
].join('\n');
