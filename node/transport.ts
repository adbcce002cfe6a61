import fs from 'fs/promises';
import path from 'path';
import { FetchFailedError } from './errors';

/** Where manifest and database bytes come from. Paths are relative to the bundle root. */
export interface SnapshotTransport {
  readonly description: string;
  getJson(relativePath: string): Promise<unknown>;
  getBytes(relativePath: string): Promise<Uint8Array>;
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** Static bundle served over HTTP. Requests bypass intermediary caches. */
export class HttpTransport implements SnapshotTransport {
  readonly description: string;
  private readonly baseUrl: string;

  constructor(baseUrl: string, private readonly fetchImpl: FetchLike = fetch) {
    this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    this.description = this.baseUrl;
  }

  private async request(relativePath: string): Promise<Response> {
    const url = new URL(relativePath, this.baseUrl).toString();
    let res: Response;
    try {
      res = await this.fetchImpl(url, { headers: { 'Cache-Control': 'no-cache' } });
    } catch (error) {
      throw new FetchFailedError(relativePath, undefined, { cause: error });
    }
    if (!res.ok) throw new FetchFailedError(relativePath, res.status);
    return res;
  }

  async getJson(relativePath: string): Promise<unknown> {
    const res = await this.request(relativePath);
    try {
      const body: unknown = await res.json();
      return body;
    } catch (error) {
      throw new FetchFailedError(relativePath, res.status, { cause: error, reason: 'malformed JSON' });
    }
  }

  async getBytes(relativePath: string): Promise<Uint8Array> {
    const res = await this.request(relativePath);
    return new Uint8Array(await res.arrayBuffer());
  }
}

/** Bundle exported to a local directory. Paths may not escape `rootDir`. */
export class FileTransport implements SnapshotTransport {
  readonly description: string;
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
    this.description = this.rootDir;
  }

  private resolve(relativePath: string): string {
    const full = path.resolve(this.rootDir, relativePath);
    if (full !== this.rootDir && !full.startsWith(this.rootDir + path.sep)) {
      throw new FetchFailedError(relativePath, undefined, { reason: 'outside bundle root' });
    }
    return full;
  }

  async getBytes(relativePath: string): Promise<Uint8Array> {
    const full = this.resolve(relativePath);
    try {
      return new Uint8Array(await fs.readFile(full));
    } catch (error) {
      throw new FetchFailedError(relativePath, undefined, { cause: error, reason: 'not readable' });
    }
  }

  async getJson(relativePath: string): Promise<unknown> {
    const bytes = await this.getBytes(relativePath);
    try {
      const value: unknown = JSON.parse(Buffer.from(bytes).toString('utf8'));
      return value;
    } catch (error) {
      throw new FetchFailedError(relativePath, undefined, { cause: error, reason: 'malformed JSON' });
    }
  }
}
