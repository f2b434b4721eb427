import type { Entry, ZipFile } from 'yauzl';

import * as yauzl from 'yauzl';

/**
 * Read-only access to ZIP packages (OOXML documents, engine result archives).
 */
export class ZipReader {
  /**
   * List entry names from the central directory without decompressing
   * anything.
   */
  static async listEntries(zipPath: string): Promise<string[]> {
    const names: string[] = [];
    await ZipReader.walk(zipPath, (zipfile, entry) => {
      names.push(entry.fileName);
      zipfile.readEntry();
    });
    return names;
  }

  /**
   * Read the entries accepted by `filter` into memory, keyed by entry name.
   * Directory entries are skipped.
   */
  static async readEntries(
    zipPath: string,
    filter: (fileName: string) => boolean,
  ): Promise<Map<string, Buffer>> {
    const contents = new Map<string, Buffer>();

    await ZipReader.walk(zipPath, (zipfile, entry, fail) => {
      if (/\/$/.test(entry.fileName) || !filter(entry.fileName)) {
        zipfile.readEntry();
        return;
      }

      zipfile.openReadStream(entry, (err, readStream) => {
        if (err || !readStream) {
          fail(err || new Error('Failed to open read stream'));
          return;
        }

        const chunks: Buffer[] = [];
        readStream.on('data', (chunk: Buffer) => chunks.push(chunk));
        readStream.on('end', () => {
          contents.set(entry.fileName, Buffer.concat(chunks));
          zipfile.readEntry();
        });
        readStream.on('error', fail);
      });
    });

    return contents;
  }

  /**
   * Read a single entry as UTF-8 text, or undefined when it is absent.
   */
  static async readText(
    zipPath: string,
    fileName: string,
  ): Promise<string | undefined> {
    const entries = await ZipReader.readEntries(
      zipPath,
      (name) => name === fileName,
    );
    return entries.get(fileName)?.toString('utf-8');
  }

  private static walk(
    zipPath: string,
    onEntry: (
      zipfile: ZipFile,
      entry: Entry,
      fail: (error: Error) => void,
    ) => void,
  ): Promise<void> {
    return new Promise((resolve, reject) => {
      yauzl.open(zipPath, { lazyEntries: true }, (err, zipfile) => {
        if (err || !zipfile) {
          reject(err || new Error('Failed to open zip file'));
          return;
        }

        const fail = (error: Error) => {
          zipfile.close();
          reject(error);
        };

        zipfile.on('entry', (entry: Entry) => onEntry(zipfile, entry, fail));
        zipfile.on('end', () => resolve());
        zipfile.on('error', reject);

        zipfile.readEntry();
      });
    });
  }
}
