import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  NetworkError,
  PackageState,
  type Book,
  type BookGroup,
  type LogLevel,
  type MirrorLogger,
  type Package,
  type TransferProgressCallback,
} from "@helpmirror/catalog-sdk";
import type { CatalogFetcher } from "@helpmirror/catalog-service";
import type { PackageTransport } from "@helpmirror/offline-cache";

export async function withTempDir<T>(run: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "helpmirror-test-"));
  try {
    return await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export function encode(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export interface LogRecord {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export interface RecordingLogger extends MirrorLogger {
  records: LogRecord[];
}

/**
 * Logger that keeps entries in memory instead of printing them
 */
export function createRecordingLogger(): RecordingLogger {
  const records: LogRecord[] = [];
  const record = (level: LogLevel) => (message: string, meta?: Record<string, unknown>) => {
    records.push({ level, message, meta });
  };
  return {
    records,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

export function makePackage(overrides: Partial<Package> = {}): Package {
  return {
    name: "A",
    deployed: "true",
    lastModified: new Date("2017-03-01T10:00:00.000Z"),
    etag: "etag-a",
    link: "packages/a.cab",
    size: 1000,
    uncompressedSize: 4000,
    state: PackageState.NotDownloaded,
    ...overrides,
  };
}

export function makeBook(overrides: Partial<Book> = {}): Book {
  return {
    code: "intro",
    locale: "en-us",
    name: "Intro",
    description: "Getting started",
    category: "C# Docs",
    brandingPackageName: "dev15",
    wanted: false,
    packages: [],
    ...overrides,
  };
}

export function makeBookGroup(overrides: Partial<BookGroup> = {}): BookGroup {
  return {
    code: "csharp",
    locale: "en-us",
    name: "C# Docs",
    description: "C# language documentation",
    vendor: "Contoso",
    books: [],
    ...overrides,
  };
}

/**
 * Bytes with a cabinet header whose recorded size matches the length
 */
export function cabinetBytes(size: number): Buffer {
  const buffer = Buffer.alloc(size);
  buffer.write("MSCF", 0, "latin1");
  buffer.writeUInt32LE(size, 8);
  return buffer;
}

export interface TransportCall {
  url: string;
  destination: string;
}

/**
 * In-process transport: writes the bytes returned by `contents` for a URL,
 * or throws the error it returns. Reports progress in `chunks` steps.
 */
export class FakeTransport implements PackageTransport {
  readonly calls: TransportCall[] = [];
  closeCount = 0;

  constructor(
    private readonly contents: (url: string) => Buffer | Error,
    private readonly chunks = 2,
  ) {}

  async download(
    url: string,
    destination: string,
    onProgress: TransferProgressCallback,
  ): Promise<void> {
    this.calls.push({ url, destination });
    const body = this.contents(url);
    if (body instanceof Error) {
      throw body;
    }

    for (let step = 1; step <= this.chunks; step++) {
      onProgress(Math.floor((body.length * step) / this.chunks), body.length);
    }
    await writeFile(destination, body);
  }

  async close(): Promise<void> {
    this.closeCount++;
  }
}

/**
 * Fetcher answering from a path-to-payload table
 */
export class FakeCatalogFetcher implements CatalogFetcher {
  readonly requests: string[] = [];

  constructor(private readonly payloads: Record<string, string>) {}

  async getBytes(path: string): Promise<Uint8Array> {
    this.requests.push(path);
    const payload = this.payloads[path];
    if (payload === undefined) {
      throw new NetworkError("HTTP 404: Not Found", path, 404);
    }
    return encode(payload);
  }
}
