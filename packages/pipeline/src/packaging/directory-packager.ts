import type { LoggerMethods } from '@docmill/logger';

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

import type { OutputPackager, PackagedOutput } from './output-packager';
import type { PackagerInput } from './output-plan';

import { PackagingError } from '../errors';
import { planOutput } from './output-plan';

/**
 * Writes a tree of `<stem>.md` files, `images/<stem>/...` and
 * `manifest.json` under the destination directory. Existing files with the
 * same names are replaced, so writing the same input twice is a no-op.
 */
export class DirectoryPackager implements OutputPackager {
  constructor(private readonly logger: LoggerMethods) {}

  async write(
    input: PackagerInput,
    destination: string,
  ): Promise<PackagedOutput> {
    const root = resolve(destination);
    const { files } = planOutput(input);

    try {
      for (const file of files) {
        const target = join(root, file.path);
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, file.data);
      }
    } catch (error) {
      throw PackagingError.fromError(`Failed to write output to ${root}`, error);
    }

    this.logger.info(
      `[DirectoryPackager] Wrote ${files.length} file(s) to ${root}`,
    );
    return { destination: root, files: files.map((file) => file.path) };
  }
}
