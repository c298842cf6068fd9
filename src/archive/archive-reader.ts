import yauzl, { type Entry, type ZipFile } from 'yauzl';
import { IoError, errorMessage } from '../errors/custom-errors';

function openZip(path: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(path, { lazyEntries: true, autoClose: true }, (error, zipfile) => {
      if (error || !zipfile) {
        reject(error ?? new Error('No archive'));
        return;
      }
      resolve(zipfile);
    });
  });
}

function readEntry(zipfile: ZipFile, entry: Entry): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (error, stream) => {
      if (error || !stream) {
        reject(error ?? new Error(`Cannot open ${entry.fileName}`));
        return;
      }
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('error', reject);
      stream.on('end', () => resolve(Buffer.concat(chunks)));
    });
  });
}

/**
 * Read the file entries of a zip archive that `select` accepts
 *
 * Entries are visited in archive order; directories are skipped.
 * @throws IoError if the file is missing or not a zip archive
 */
export async function readZipEntries(path: string, select: (name: string) => boolean): Promise<Map<string, Buffer>> {
  try {
    const zipfile = await openZip(path);
    return await new Promise<Map<string, Buffer>>((resolve, reject) => {
      const entries = new Map<string, Buffer>();
      const fail = (error: unknown) => {
        zipfile.close();
        reject(error);
      };

      zipfile.on('error', fail);
      zipfile.on('end', () => resolve(entries));
      zipfile.on('entry', (entry: Entry) => {
        if (entry.fileName.endsWith('/') || !select(entry.fileName)) {
          zipfile.readEntry();
          return;
        }
        readEntry(zipfile, entry).then((data) => {
          entries.set(entry.fileName, data);
          zipfile.readEntry();
        }, fail);
      });
      zipfile.readEntry();
    });
  } catch (error) {
    throw new IoError(`Cannot read archive: ${errorMessage(error)}`, path);
  }
}

/**
 * Names of the file entries of a zip archive
 */
export async function listZipEntries(path: string): Promise<string[]> {
  const names: string[] = [];
  await readZipEntries(path, (name) => {
    names.push(name);
    return false;
  });
  return names;
}
