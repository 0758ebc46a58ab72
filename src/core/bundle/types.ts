export interface ArchiveEntry {
  readonly path: string;
  readonly content: string;
}

/** Entry path → decoded text. Iteration order carries no meaning. */
export type ArchiveContents = ReadonlyMap<string, string>;

export interface RoleSpec {
  /** Exact archive entry path this role matches. */
  readonly name: string;
  /** Question suffix appended to the base instructions in per-file prompts. */
  readonly instructions?: string;
}

export interface RoleTable {
  /** Roles in selection order. */
  readonly roles: readonly RoleSpec[];
  get(name: string): RoleSpec | undefined;
}

export interface SelectedFile {
  readonly name: string;
  readonly content: string;
  readonly truncated: boolean;
  /** Length of the content before truncation. */
  readonly originalLength: number;
}
