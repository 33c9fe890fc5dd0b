import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { createRequire } from "node:module";
import { dirname } from "node:path";
import type { Database, SqlJsStatic } from "sql.js";
import type { EnrichedRecord } from "../etl/types.js";

export type StoredDocument = EnrichedRecord;

export type ListOptions = {
  limit: number;
  offset: number;
};

export interface DocumentStore {
  readonly collection: string;
  upsert(document: StoredDocument): Promise<void>;
  get(id: string): Promise<StoredDocument | null>;
  list(options: ListOptions): Promise<StoredDocument[]>;
  count(): Promise<number>;
  all(): Promise<StoredDocument[]>;
}

export class InvalidDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDocumentError";
  }
}

type SqliteDocumentStoreOptions = {
  dbPath: string;
  collection: string;
};

type SqlValue = ReturnType<Database["exec"]>[number]["values"][number][number];

const MEMORY_PATH = ":memory:";

const require = createRequire(import.meta.url);
const initSqlJs: () => Promise<SqlJsStatic> = require("sql.js");

/**
 * Documents live in one SQLite table keyed by (collection, id), held by the WASM build of
 * SQLite. A file-backed store loads the file on open and writes it back after each upsert.
 */
export class SqliteDocumentStore implements DocumentStore {
  readonly dbPath: string;
  readonly collection: string;

  private readonly ready: Promise<Database>;

  constructor(options: SqliteDocumentStoreOptions) {
    this.dbPath = options.dbPath;
    this.collection = options.collection;
    this.ready = this.open();
  }

  async upsert(document: StoredDocument): Promise<void> {
    if (typeof document.id !== "string" || !document.id) {
      throw new InvalidDocumentError("Document is missing a non-empty string id");
    }

    const db = await this.ready;
    db.run(
      `
      INSERT INTO documents (collection, id, body_json, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(collection, id) DO UPDATE SET
        body_json = excluded.body_json,
        updated_at = excluded.updated_at
    `,
      [this.collection, document.id, JSON.stringify(document), new Date().toISOString()]
    );
    this.persist(db);
  }

  async get(id: string): Promise<StoredDocument | null> {
    const db = await this.ready;
    const [row] = selectColumn(db, "SELECT body_json FROM documents WHERE collection = ? AND id = ?", [
      this.collection,
      id,
    ]);
    return row === undefined ? null : decodeBody(row);
  }

  async list(options: ListOptions): Promise<StoredDocument[]> {
    const db = await this.ready;
    return selectColumn(
      db,
      `
        SELECT body_json FROM documents
        WHERE collection = ?
        ORDER BY id ASC
        LIMIT ? OFFSET ?
      `,
      [this.collection, options.limit, options.offset]
    ).map(decodeBody);
  }

  async count(): Promise<number> {
    const db = await this.ready;
    const [total] = selectColumn(db, "SELECT COUNT(*) AS total FROM documents WHERE collection = ?", [this.collection]);
    return typeof total === "number" ? total : 0;
  }

  async all(): Promise<StoredDocument[]> {
    const db = await this.ready;
    return selectColumn(db, "SELECT body_json FROM documents WHERE collection = ? ORDER BY id ASC", [
      this.collection,
    ]).map(decodeBody);
  }

  async close(): Promise<void> {
    const db = await this.ready;
    db.close();
  }

  private async open(): Promise<Database> {
    const SQL = await initSqlJs();
    const db =
      this.dbPath !== MEMORY_PATH && existsSync(this.dbPath)
        ? new SQL.Database(readFileSync(this.dbPath))
        : new SQL.Database();

    db.run(`
      CREATE TABLE IF NOT EXISTS documents (
        collection TEXT NOT NULL,
        id TEXT NOT NULL,
        body_json TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (collection, id)
      );
      CREATE INDEX IF NOT EXISTS idx_documents_updated ON documents(collection, updated_at DESC);
    `);
    return db;
  }

  private persist(db: Database): void {
    if (this.dbPath === MEMORY_PATH) return;
    mkdirSync(dirname(this.dbPath), { recursive: true });
    writeFileSync(this.dbPath, db.export());
  }
}

function selectColumn(db: Database, sql: string, params: Array<string | number>): SqlValue[] {
  const [result] = db.exec(sql, params);
  return result ? result.values.map((row) => row[0] ?? null) : [];
}

function decodeBody(value: SqlValue): StoredDocument {
  if (typeof value !== "string") {
    throw new InvalidDocumentError("Stored document body is not text");
  }
  const parsed: StoredDocument = JSON.parse(value);
  return parsed;
}
