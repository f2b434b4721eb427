import type { LoggerMethods } from '@docmill/logger';
import type { DocumentFormat, SourceDocument } from '@docmill/model';

import { open, stat } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';

import { FORMAT_SNIFFER } from '../config/constants';
import {
  ProgrammerError,
  UnknownFormatError,
  UnsupportedFormatError,
} from '../errors';
import { ZipReader } from '../utils/zip-reader';

/**
 * Recognized extensions (lower-case, without the dot)
 */
export const EXTENSION_FORMATS: Readonly<Record<string, DocumentFormat>> = {
  pdf: 'pdf',
  docx: 'docx',
  pptx: 'pptx',
  html: 'html',
  htm: 'html',
  txt: 'txt',
  text: 'txt',
  md: 'md',
  markdown: 'md',
};

const PDF_MAGIC = Buffer.from('%PDF-', 'latin1');
const PDF_EOF = Buffer.from('%%EOF', 'latin1');
const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

const DOCX_ROOT_PART = 'word/document.xml';
const PPTX_ROOT_PART = 'ppt/presentation.xml';

interface FileSample {
  head: Buffer;
  tail: Buffer;
}

/**
 * FormatSniffer
 *
 * Classifies a file by extension first, then confirms (or overrides) the
 * guess from a bounded sample of its content. Never writes anything.
 */
export class FormatSniffer {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Classify a file into a SourceDocument.
   *
   * @throws UnknownFormatError when the extension is not recognized
   * @throws UnsupportedFormatError when the content is empty, truncated or
   *   does not match any supported format
   * @throws ProgrammerError when the path is not an existing regular file
   */
  async classify(path: string): Promise<SourceDocument> {
    const absolutePath = resolve(path);
    const name = basename(absolutePath);
    const extension = extname(name).slice(1).toLowerCase();
    const extensionFormat = EXTENSION_FORMATS[extension];

    if (!extensionFormat) {
      throw new UnknownFormatError(
        extension
          ? `Unrecognized extension ".${extension}": ${name}`
          : `File has no extension: ${name}`,
      );
    }

    const stats = await stat(absolutePath).catch((error: unknown) => {
      throw new ProgrammerError(`Document not found: ${absolutePath}`, {
        cause: error,
      });
    });
    if (!stats.isFile()) {
      throw new ProgrammerError(`Not a regular file: ${absolutePath}`);
    }
    if (stats.size === 0) {
      throw new UnsupportedFormatError(`Empty file: ${name}`);
    }

    const sample = await this.readSample(absolutePath, stats.size);
    const format = await this.detect(
      absolutePath,
      name,
      sample,
      extensionFormat,
    );

    if (format !== extensionFormat) {
      this.logger.warn(
        `[FormatSniffer] ${name}: content is ${format}, extension says ${extensionFormat}`,
      );
    }
    this.logger.debug(`[FormatSniffer] Classified ${name} as ${format}`);

    return {
      path: absolutePath,
      name,
      extension,
      format,
      sizeBytes: stats.size,
    };
  }

  private async detect(
    path: string,
    name: string,
    { head, tail }: FileSample,
    extensionFormat: DocumentFormat,
  ): Promise<DocumentFormat> {
    if (startsWith(head, PDF_MAGIC)) {
      if (tail.indexOf(PDF_EOF) === -1) {
        throw new UnsupportedFormatError(
          `Truncated PDF (no %%EOF trailer): ${name}`,
        );
      }
      return 'pdf';
    }

    if (startsWith(head, ZIP_MAGIC)) {
      return this.detectZipPackage(path, name);
    }

    if (head.includes(0)) {
      throw new UnsupportedFormatError(
        `Binary content does not match .${extensionFormat}: ${name}`,
      );
    }

    if (looksLikeHtml(head)) {
      return 'html';
    }

    switch (extensionFormat) {
      case 'txt':
      case 'md':
      case 'html':
        return extensionFormat;
      default:
        throw new UnsupportedFormatError(
          `Text content does not match .${extensionFormat}: ${name}`,
        );
    }
  }

  private async detectZipPackage(
    path: string,
    name: string,
  ): Promise<DocumentFormat> {
    let entries: string[];
    try {
      entries = await ZipReader.listEntries(path);
    } catch (error) {
      throw UnsupportedFormatError.fromError(
        `Unreadable ZIP directory in ${name}`,
        error,
      );
    }

    if (entries.includes(DOCX_ROOT_PART)) {
      return 'docx';
    }
    if (entries.includes(PPTX_ROOT_PART)) {
      return 'pptx';
    }
    throw new UnsupportedFormatError(
      `ZIP package without a document part: ${name}`,
    );
  }

  private async readSample(path: string, size: number): Promise<FileSample> {
    const handle = await open(path, 'r');
    try {
      const headLength = Math.min(size, FORMAT_SNIFFER.HEAD_BYTES);
      const head = Buffer.alloc(headLength);
      await handle.read(head, 0, headLength, 0);

      const tailLength = Math.min(size, FORMAT_SNIFFER.TAIL_BYTES);
      const tail = Buffer.alloc(tailLength);
      await handle.read(tail, 0, tailLength, size - tailLength);

      return { head, tail };
    } finally {
      await handle.close();
    }
  }
}

function startsWith(buffer: Buffer, prefix: Buffer): boolean {
  return (
    buffer.length >= prefix.length &&
    buffer.subarray(0, prefix.length).equals(prefix)
  );
}

function looksLikeHtml(head: Buffer): boolean {
  const text = head
    .toString('utf-8')
    .replace(/^\uFEFF/, '')
    .trimStart()
    .toLowerCase();
  return text.startsWith('<!doctype html') || /^<html[\s>]/.test(text);
}
