import pino, { type Logger } from "pino";
import type { Server } from "node:http";
import type { Express } from "express";
import { BlobNotFoundError, type BlobStore } from "../src/storage/blobStore.js";
import type { DocumentStore, ListOptions, StoredDocument } from "../src/storage/documentStore.js";
import type { RawRecord } from "../src/etl/types.js";

// ── fakes ──────────────────────────────────────────────────────────────────

export class FakeDocumentStore implements DocumentStore {
  readonly collection = "cocktails";
  readonly documents = new Map<string, StoredDocument>();
  readonly upsertCalls: string[] = [];

  constructor(private readonly failingIds: Set<string> = new Set()) {}

  async upsert(document: StoredDocument): Promise<void> {
    this.upsertCalls.push(document.id);
    if (this.failingIds.has(document.id)) {
      throw new Error(`write rejected for ${document.id}`);
    }
    this.documents.set(document.id, document);
  }

  async get(id: string): Promise<StoredDocument | null> {
    return this.documents.get(id) ?? null;
  }

  async list(options: ListOptions): Promise<StoredDocument[]> {
    return (await this.all()).slice(options.offset, options.offset + options.limit);
  }

  async count(): Promise<number> {
    return this.documents.size;
  }

  async all(): Promise<StoredDocument[]> {
    return Array.from(this.documents.values()).sort((a, b) => a.id.localeCompare(b.id));
  }
}

export class MemoryBlobStore implements BlobStore {
  readonly blobs = new Map<string, string>();
  reads = 0;

  async read(container: string, name: string): Promise<string> {
    this.reads += 1;
    const content = this.blobs.get(`${container}/${name}`);
    if (content === undefined) {
      throw new BlobNotFoundError(container, name);
    }
    return content;
  }

  async write(container: string, name: string, content: string): Promise<void> {
    this.blobs.set(`${container}/${name}`, content);
  }
}

// ── logging ────────────────────────────────────────────────────────────────

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function captureLogger(): { log: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const log = pino(
    { level: "debug" },
    {
      write: (line: string) => {
        lines.push(JSON.parse(line));
      },
    }
  );
  return { log, lines };
}

// ── fixtures ───────────────────────────────────────────────────────────────

export const FIXED_NOW = new Date("2024-05-01T12:30:00.000Z");

export function margarita(): RawRecord {
  return {
    id: "11007",
    name: "Margarita",
    category: "Cocktail",
    alcoholic_flag: "Alcoholic",
    instructions: "Shake.",
    ingredient_1: "Tequila",
    measure_1: "1 1/2 oz",
    ingredient_2: "Triple sec",
    measure_2: "1/2 oz",
    ingredient_3: "",
    measure_3: "",
  };
}

export function makeRecord(id: string, overrides: RawRecord = {}): RawRecord {
  return {
    id,
    name: `Drink ${id}`,
    category: "Ordinary Drink",
    alcoholic_flag: "Alcoholic",
    instructions: "Stir with ice.",
    ingredient_1: "Gin",
    measure_1: "2 oz",
    ...overrides,
  };
}

// ── http ───────────────────────────────────────────────────────────────────

export async function withServer<T>(app: Express, run: (baseURL: string) => Promise<T>): Promise<T> {
  const server = await new Promise<Server>((resolve, reject) => {
    const instance = app.listen(0, () => resolve(instance));
    instance.on("error", reject);
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    throw new Error("Failed to resolve test server address");
  }

  const baseURL = `http://127.0.0.1:${address.port}`;
  try {
    return await run(baseURL);
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}
