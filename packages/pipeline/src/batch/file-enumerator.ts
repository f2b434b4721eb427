import type { LoggerMethods } from '@docmill/logger';

import type { Dirent } from 'node:fs';

import { readdir, realpath, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';

/**
 * Lists the regular files of an input directory.
 *
 * Hidden entries (dot-prefixed) are skipped. Symbolic links are followed;
 * a directory whose real path was already visited is skipped so link
 * cycles terminate. A subdirectory that cannot be read is logged and
 * skipped; only a failure on the input directory itself rejects. Paths are
 * reported under the input directory as given, sorted.
 */
export class FileEnumerator {
  constructor(private readonly logger: LoggerMethods) {}

  async enumerate(directory: string, recursive: boolean): Promise<string[]> {
    const root = resolve(directory);
    const visited = new Set([await realpath(root)]);
    const files: string[] = [];

    await this.walk(
      root,
      await readdir(root, { withFileTypes: true }),
      recursive,
      visited,
      files,
    );

    return files.sort();
  }

  private async walk(
    directory: string,
    entries: Dirent[],
    recursive: boolean,
    visited: Set<string>,
    files: string[],
  ): Promise<void> {
    for (const entry of entries) {
      if (entry.name.startsWith('.')) {
        continue;
      }
      const path = join(directory, entry.name);
      let isFile = entry.isFile();
      let isDirectory = entry.isDirectory();

      if (entry.isSymbolicLink()) {
        const target = await stat(path).catch((error: unknown) => {
          this.logger.warn(
            `[FileEnumerator] Skipping broken link ${path}: ${messageOf(error)}`,
          );
          return undefined;
        });
        if (!target) {
          continue;
        }
        isFile = target.isFile();
        isDirectory = target.isDirectory();
      }

      if (isFile) {
        files.push(path);
      } else if (isDirectory && recursive) {
        let real: string;
        let children: Dirent[];
        try {
          real = await realpath(path);
          if (visited.has(real)) {
            this.logger.warn(
              `[FileEnumerator] Skipping ${path}: ${real} was already visited`,
            );
            continue;
          }
          children = await readdir(path, { withFileTypes: true });
        } catch (error) {
          this.logger.warn(
            `[FileEnumerator] Skipping unreadable directory ${path}: ${messageOf(error)}`,
          );
          continue;
        }
        visited.add(real);
        await this.walk(path, children, recursive, visited, files);
      }
    }
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
