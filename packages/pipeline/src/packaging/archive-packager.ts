import type { LoggerMethods } from '@docmill/logger';

import archiver from 'archiver';
import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { pipeline } from 'node:stream/promises';

import type { OutputPackager, PackagedOutput } from './output-packager';
import type { PackagerInput } from './output-plan';

import { PACKAGING } from '../config/constants';
import { PackagingError } from '../errors';
import { planOutput } from './output-plan';

/**
 * Bundles the same layout as {@link DirectoryPackager} into one ZIP file.
 *
 * Entries carry a fixed date and a fixed order, so the same input always
 * produces the same archive.
 */
export class ArchivePackager implements OutputPackager {
  constructor(private readonly logger: LoggerMethods) {}

  async write(
    input: PackagerInput,
    destination: string,
  ): Promise<PackagedOutput> {
    const archivePath = resolve(destination);
    const { files } = planOutput(input);
    const date = new Date(PACKAGING.ARCHIVE_ENTRY_DATE);

    try {
      await mkdir(dirname(archivePath), { recursive: true });

      const archive = archiver('zip', {
        zlib: { level: PACKAGING.ARCHIVE_COMPRESSION_LEVEL },
      });
      archive.on('warning', (warning) => {
        this.logger.warn(`[ArchivePackager] ${warning.message}`);
      });

      const written = pipeline(archive, createWriteStream(archivePath));
      for (const file of files) {
        archive.append(
          typeof file.data === 'string'
            ? file.data
            : Buffer.from(file.data),
          { name: file.path, date },
        );
      }
      await Promise.all([archive.finalize(), written]);
    } catch (error) {
      throw PackagingError.fromError(
        `Failed to write archive ${archivePath}`,
        error,
      );
    }

    this.logger.info(
      `[ArchivePackager] Wrote ${files.length} entries to ${archivePath}`,
    );
    return {
      destination: archivePath,
      files: files.map((file) => file.path),
    };
  }
}
