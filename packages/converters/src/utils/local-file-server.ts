import type { Server } from 'node:http';

import { randomUUID } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { createServer } from 'node:http';
import { basename, extname } from 'node:path';

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.pdf': 'application/pdf',
  '.docx':
    'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.pptx':
    'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  '.html': 'text/html; charset=utf-8',
  '.htm': 'text/html; charset=utf-8',
  '.md': 'text/markdown; charset=utf-8',
  '.markdown': 'text/markdown; charset=utf-8',
};

/**
 * Exposes one local file on a loopback port.
 *
 * The inference engine only fetches sources over HTTP. The file lives under
 * a random path segment so nothing else on the host can guess its URL.
 */
export class LocalFileServer {
  private server?: Server;

  /**
   * Start serving `filePath` and return its URL.
   */
  async start(filePath: string): Promise<string> {
    const { size } = await stat(filePath);
    const route = `/${randomUUID()}/${encodeURIComponent(basename(filePath))}`;
    const contentType =
      CONTENT_TYPES[extname(filePath).toLowerCase()] ??
      'application/octet-stream';

    const server = createServer((req, res) => {
      if (req.method !== 'GET' || req.url !== route) {
        res.writeHead(404).end('Not Found');
        return;
      }
      res.writeHead(200, {
        'Content-Type': contentType,
        'Content-Length': size,
      });
      createReadStream(filePath).pipe(res);
    });
    this.server = server;

    const port = await new Promise<number>((resolve, reject) => {
      server.once('error', reject);
      server.listen(0, '127.0.0.1', () => {
        const address = server.address();
        if (address && typeof address === 'object') {
          resolve(address.port);
        } else {
          reject(new Error('Loopback server has no port'));
        }
      });
    });

    return `http://127.0.0.1:${port}${route}`;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
