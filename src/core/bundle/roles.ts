import { ROLE_INSTRUCTIONS, type DefaultRoleName } from '../../templates/analysis-prompt.js';
import { ConfigError } from '../errors.js';
import type { RoleSpec, RoleTable } from './types.js';

/** Selection order for the default table: schema first, then the statement, its plan, the session env. */
export const DEFAULT_ROLE_ORDER: readonly DefaultRoleName[] = ['schema.sql', 'statement.sql', 'plan.txt', 'env.sql'];

/**
 * Build an immutable role table. Order of `specs` is the selection order.
 * Names must be non-empty and unique.
 */
export function createRoleTable(specs: readonly RoleSpec[]): RoleTable {
  const byName = new Map<string, RoleSpec>();
  for (const spec of specs) {
    if (!spec.name) throw new ConfigError('Role name must not be empty');
    if (byName.has(spec.name)) throw new ConfigError(`Duplicate role '${spec.name}'`);
    byName.set(spec.name, Object.freeze({ ...spec }));
  }

  const roles = Object.freeze([...byName.values()]);
  return Object.freeze({
    roles,
    get: (name: string) => byName.get(name),
  });
}

export function defaultRoleTable(): RoleTable {
  return createRoleTable(
    DEFAULT_ROLE_ORDER.map((name) => ({
      name,
      instructions: ROLE_INSTRUCTIONS[name].join('\n'),
    })),
  );
}
