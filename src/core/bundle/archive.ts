import { readFile } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import { buffer } from 'node:stream/consumers';
import yauzl, { type Entry, type ZipFile } from 'yauzl';

import { ArchiveReadError, BundleFileError, EntryReadError } from '../errors.js';
import type { ArchiveContents, ArchiveEntry } from './types.js';

/**
 * Read a statement bundle from disk and return its raw bytes.
 */
export async function readBundleFile(path: string): Promise<Uint8Array> {
  try {
    return await readFile(path);
  } catch (err) {
    throw new BundleFileError(path, { cause: err });
  }
}

/**
 * Decompress an in-memory zip archive into entry path → text.
 *
 * Entry paths are kept exactly as stored: no separator rewriting and no
 * rejection of `..` or absolute names. Directory entries are skipped. Entry bytes are decoded as UTF-8 with no
 * detection. Each entry stream is destroyed once drained (or on failure) and
 * the archive handle is closed before returning.
 */
export async function readBundleArchive(bytes: Uint8Array): Promise<ArchiveContents> {
  const contents = new Map<string, string>();
  for await (const entry of iterateArchive(bytes)) {
    contents.set(entry.path, entry.content);
  }
  return contents;
}

/**
 * Yield each file entry of the archive in central-directory order.
 * Stopping the iteration early closes the archive.
 */
export async function* iterateArchive(bytes: Uint8Array): AsyncGenerator<ArchiveEntry, void, undefined> {
  const zip = await openZip(bytes);
  try {
    for (let entry = await nextEntry(zip); entry !== null; entry = await nextEntry(zip)) {
      const path = decodeEntryName(entry);
      if (isDirectoryEntry(path)) continue;
      yield { path, content: await readEntryText(zip, entry, path) };
    }
  } finally {
    zip.close();
  }
}

export function isDirectoryEntry(path: string): boolean {
  return path.endsWith('/');
}

/** General-purpose flag bit 11: the stored name is UTF-8. */
const UTF8_NAME_FLAG = 0x800;

/**
 * Decode the raw name bytes of an entry opened with `decodeStrings: false`.
 * Names without the UTF-8 flag are read byte for byte.
 */
function decodeEntryName(entry: Pick<Entry, 'fileName' | 'generalPurposeBitFlag'>): string {
  const raw: unknown = entry.fileName;
  if (!Buffer.isBuffer(raw)) return entry.fileName;
  return raw.toString(entry.generalPurposeBitFlag & UTF8_NAME_FLAG ? 'utf8' : 'latin1');
}

function openZip(bytes: Uint8Array): Promise<ZipFile> {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return new Promise((resolve, reject) => {
    yauzl.fromBuffer(buf, { lazyEntries: true, autoClose: false, decodeStrings: false }, (err, zip) => {
      if (err || !zip) {
        reject(new ArchiveReadError({ cause: err }));
        return;
      }
      resolve(zip);
    });
  });
}

/** Advance the lazy entry cursor; resolves null at the end of the central directory. */
function nextEntry(zip: ZipFile): Promise<Entry | null> {
  return new Promise((resolve, reject) => {
    const onEntry = (entry: Entry) => {
      cleanup();
      resolve(entry);
    };
    const onEnd = () => {
      cleanup();
      resolve(null);
    };
    const onError = (err: Error) => {
      cleanup();
      reject(new ArchiveReadError({ cause: err }));
    };
    const cleanup = () => {
      zip.off('entry', onEntry);
      zip.off('end', onEnd);
      zip.off('error', onError);
    };

    zip.on('entry', onEntry);
    zip.on('end', onEnd);
    zip.on('error', onError);
    zip.readEntry();
  });
}

async function readEntryText(zip: ZipFile, entry: Entry, path: string): Promise<string> {
  const stream = await openEntryStream(zip, entry, path);
  try {
    const data = await buffer(stream);
    return data.toString('utf8');
  } catch (err) {
    throw new EntryReadError(path, { cause: err });
  } finally {
    stream.destroy();
  }
}

function openEntryStream(zip: ZipFile, entry: Entry, path: string): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zip.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(new EntryReadError(path, { cause: err }));
        return;
      }
      resolve(stream);
    });
  });
}
