import type Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import { serializeEmbedding, deserializeEmbedding } from "./embeddings.js";

// --- Types ---

export interface StoredRecord {
  id: string;
  owner_id: string;
  content: string;
  category: string | null;
  tags: string[];
  embedding: Float32Array;
  created_at: string;           // ISO-8601, immutable
  access_count: number;
  memory_weight: number;
  reinforcement_level: number;
  last_accessed: string | null;
}

/** Record without its vector, for listings */
export type RecordView = Omit<StoredRecord, "embedding">;

export interface NewRecord {
  owner_id: string;
  content: string;
  category?: string | null;
  tags?: string[];
  embedding: Float32Array;
  created_at: Date;
}

/** Compare-and-swap write of the mutable weight fields */
export interface WeightUpdate {
  id: string;
  owner_id: string;
  expected_access_count: number;
  access_count: number;
  memory_weight: number;
  reinforcement_level: number;
  last_accessed: string;
}

export interface DateRange {
  start?: Date;
  end?: Date;
}

interface RecordRow {
  id: string;
  owner_id: string;
  content: string;
  category: string | null;
  tags: string;
  embedding: Buffer;
  created_at: string;
  access_count: number;
  memory_weight: number;
  reinforcement_level: number;
  last_accessed: string | null;
}

// --- Store ---

/**
 * Durable record collection. Every read is scoped by owner id; there is no
 * query path that can return another owner's rows.
 */
export class RecordStore {
  private db: Database.Database;
  private stmts: Record<string, Database.Statement>;

  constructor(db: Database.Database) {
    this.db = db;
    this.stmts = this.prepareStatements();
  }

  private prepareStatements(): Record<string, Database.Statement> {
    return {
      insert: this.db.prepare(`
        INSERT INTO records (id, owner_id, content, category, tags, embedding, created_at)
        VALUES (@id, @owner_id, @content, @category, @tags, @embedding, @created_at)
      `),
      get: this.db.prepare(`SELECT * FROM records WHERE id = ? AND owner_id = ?`),
      byOwner: this.db.prepare(`
        SELECT * FROM records
        WHERE owner_id = @owner_id
          AND created_at >= COALESCE(@start, created_at)
          AND created_at <= COALESCE(@end, created_at)
        ORDER BY created_at ASC, id ASC
      `),
      createdAfter: this.db.prepare(`
        SELECT * FROM records
        WHERE owner_id = @owner_id AND created_at > @after
        ORDER BY created_at ASC, id ASC
      `),
      casWeights: this.db.prepare(`
        UPDATE records SET
          access_count = @access_count,
          memory_weight = @memory_weight,
          reinforcement_level = @reinforcement_level,
          last_accessed = @last_accessed
        WHERE id = @id AND owner_id = @owner_id AND access_count = @expected_access_count
      `),
      setWeight: this.db.prepare(
        `UPDATE records SET memory_weight = @memory_weight WHERE id = @id AND owner_id = @owner_id`
      ),
      purge: this.db.prepare(`DELETE FROM records WHERE owner_id = ?`),
      purgeMaintenance: this.db.prepare(`DELETE FROM maintenance WHERE owner_id = ?`),
      count: this.db.prepare(`SELECT COUNT(*) AS n FROM records WHERE owner_id = ?`),
      owners: this.db.prepare(`SELECT DISTINCT owner_id FROM records ORDER BY owner_id`),
      getLastDecay: this.db.prepare(`SELECT last_decay_at FROM maintenance WHERE owner_id = ?`),
      setLastDecay: this.db.prepare(`
        INSERT INTO maintenance (owner_id, last_decay_at) VALUES (@owner_id, @at)
        ON CONFLICT(owner_id) DO UPDATE SET last_decay_at = @at
      `),
    };
  }

  insert(input: NewRecord): StoredRecord {
    const record: StoredRecord = {
      id: randomUUID(),
      owner_id: input.owner_id,
      content: input.content,
      category: input.category ?? null,
      tags: input.tags ?? [],
      embedding: input.embedding,
      created_at: input.created_at.toISOString(),
      access_count: 0,
      memory_weight: 1.0,
      reinforcement_level: 0,
      last_accessed: null,
    };
    this.stmts.insert.run({
      id: record.id,
      owner_id: record.owner_id,
      content: record.content,
      category: record.category,
      tags: JSON.stringify(record.tags),
      embedding: serializeEmbedding(record.embedding),
      created_at: record.created_at,
    });
    return record;
  }

  get(id: string, ownerId: string): StoredRecord | null {
    const row = this.stmts.get.get(id, ownerId) as RecordRow | undefined;
    return row ? parseRecord(row) : null;
  }

  /** Chronological records of one owner, optionally within a date range */
  listByOwner(ownerId: string, range: DateRange = {}): StoredRecord[] {
    const rows = this.stmts.byOwner.all({
      owner_id: ownerId,
      start: range.start ? range.start.toISOString() : null,
      end: range.end ? range.end.toISOString() : null,
    }) as RecordRow[];
    return rows.map(parseRecord);
  }

  /**
   * All records of one owner read by a single statement, so weights reflect
   * one committed state.
   */
  snapshot(ownerId: string): StoredRecord[] {
    return this.listByOwner(ownerId);
  }

  createdAfter(ownerId: string, createdAt: string): StoredRecord[] {
    const rows = this.stmts.createdAfter.all({ owner_id: ownerId, after: createdAt }) as RecordRow[];
    return rows.map(parseRecord);
  }

  /** Returns false when access_count moved since it was read */
  compareAndSetWeights(update: WeightUpdate): boolean {
    return this.stmts.casWeights.run(update).changes === 1;
  }

  setWeight(id: string, ownerId: string, memoryWeight: number): void {
    this.stmts.setWeight.run({ id, owner_id: ownerId, memory_weight: memoryWeight });
  }

  /** Hard delete of every record of an owner. Returns the number removed. */
  purge(ownerId: string): number {
    return this.transaction(() => {
      const info = this.stmts.purge.run(ownerId);
      this.stmts.purgeMaintenance.run(ownerId);
      return info.changes;
    });
  }

  countByOwner(ownerId: string): number {
    const row = this.stmts.count.get(ownerId) as { n: number };
    return row.n;
  }

  owners(): string[] {
    return (this.stmts.owners.all() as { owner_id: string }[]).map((r) => r.owner_id);
  }

  getLastDecayAt(ownerId: string): string | null {
    const row = this.stmts.getLastDecay.get(ownerId) as { last_decay_at: string } | undefined;
    return row ? row.last_decay_at : null;
  }

  setLastDecayAt(ownerId: string, asOf: Date): void {
    this.stmts.setLastDecay.run({ owner_id: ownerId, at: asOf.toISOString() });
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}

// --- Helpers ---

function parseRecord(row: RecordRow): StoredRecord {
  return {
    ...row,
    tags: parseTags(row.tags),
    embedding: deserializeEmbedding(row.embedding),
  };
}

function parseTags(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === "string") : [];
}

export function toView(record: StoredRecord): RecordView {
  const { embedding: _embedding, ...view } = record;
  return view;
}
