import Database from "better-sqlite3";
import type { Database as DatabaseInstance } from "better-sqlite3";
import { z } from "zod";
import type { Case, CaseStore, ScoredCase } from "../types/index.js";
import { CaseSchema } from "../types/taskState.js";
import { rankCases } from "./InMemoryCaseStore.js";

export interface SqliteCaseStoreConfig {
  databasePath?: string;
  database?: DatabaseInstance;
}

const CaseRowSchema = z.object({ payload: z.string() });

/**
 * 以 case_id（指纹键 + 计划哈希）为主键；写入后不再更新。
 * 相似度在进程内计算，数据量与单机案例库相当。
 */
export class SqliteCaseStore implements CaseStore {
  private readonly db: DatabaseInstance;

  constructor(config: SqliteCaseStoreConfig = {}) {
    this.db = config.database ?? new Database(config.databasePath ?? ":memory:");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cases (
        case_id TEXT PRIMARY KEY,
        fingerprint_key TEXT NOT NULL,
        score REAL NOT NULL,
        payload TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS cases_fingerprint_key ON cases (fingerprint_key);
    `);
  }

  async topK(fingerprint: number[], k: number): Promise<ScoredCase[]> {
    const cases = this.db
      .prepare("SELECT payload FROM cases")
      .all()
      .map((raw) => decodeCase(raw));
    return rankCases(cases, fingerprint, k);
  }

  async write(entry: Case): Promise<boolean> {
    const validated = CaseSchema.parse(entry);
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO cases (case_id, fingerprint_key, score, payload, created_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(
        validated.caseId,
        validated.fingerprintKey,
        validated.score,
        JSON.stringify(validated),
        validated.createdAt
      );
    return result.changes === 1;
  }

  async get(caseId: string): Promise<Case | null> {
    const raw = this.db.prepare("SELECT payload FROM cases WHERE case_id = ?").get(caseId);
    return raw === undefined ? null : decodeCase(raw);
  }
}

function decodeCase(raw: unknown): Case {
  const row = CaseRowSchema.parse(raw);
  const parsed: unknown = JSON.parse(row.payload);
  return CaseSchema.parse(parsed);
}
