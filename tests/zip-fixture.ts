import { buffer } from 'node:stream/consumers';
import { Writable } from 'node:stream';
import yazl from 'yazl';

export type ZipFixtureEntry =
  | { path: string; content: string }
  | { path: string; directory: true };

/** Build a zip archive in memory. Entries are written in the given order. */
export async function buildZip(entries: ZipFixtureEntry[]): Promise<Buffer> {
  const zip = new yazl.ZipFile();
  for (const entry of entries) {
    if ('directory' in entry) zip.addEmptyDirectory(entry.path);
    else zip.addBuffer(Buffer.from(entry.content, 'utf8'), entry.path);
  }
  zip.end();
  return await buffer(zip.outputStream);
}

/** The statement bundle used across tests: three known files plus one unrelated. */
export function sampleBundleEntries(): ZipFixtureEntry[] {
  return [
    { path: 'notes.txt', content: 'irrelevant' },
    { path: 'plan.txt', content: 'scan cost=100' },
    { path: 'statement.sql', content: 'SELECT ...' },
    { path: 'schema.sql', content: 'CREATE TABLE t (...)' },
  ];
}

/**
 * Overwrite the first byte of the first entry's compressed data so that
 * inflating it fails. Only valid for archives whose first entry is deflated.
 */
export function corruptFirstEntry(zip: Buffer): Buffer {
  const copy = Buffer.from(zip);
  const nameLength = copy.readUInt16LE(26);
  const extraLength = copy.readUInt16LE(28);
  copy[30 + nameLength + extraLength] = 0xff;
  return copy;
}

/**
 * Rewrite an entry name in place, in both the local header and the central
 * directory. Lets tests store names that the zip writer refuses.
 */
export function renameEntryBytes(zip: Buffer, from: string, to: string): Buffer {
  const a = Buffer.from(from, 'utf8');
  const b = Buffer.from(to, 'utf8');
  if (a.length !== b.length) throw new Error('renamed entry must keep its byte length');

  const copy = Buffer.from(zip);
  for (let at = copy.indexOf(a); at !== -1; at = copy.indexOf(a, at + b.length)) {
    b.copy(copy, at);
  }
  return copy;
}

export function captureStream(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}
