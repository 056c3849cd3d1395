import type { Case, CaseStore, ScoredCase } from "../types/index.js";
import { CaseSchema } from "../types/taskState.js";
import { cosineSimilarity } from "../cbr/similarity.js";

export class InMemoryCaseStore implements CaseStore {
  private cases = new Map<string, Case>();

  constructor(seed: Case[] = []) {
    seed.forEach((entry) => {
      this.cases.set(entry.caseId, CaseSchema.parse(entry));
    });
  }

  async topK(fingerprint: number[], k: number): Promise<ScoredCase[]> {
    return rankCases(Array.from(this.cases.values()), fingerprint, k);
  }

  async write(entry: Case): Promise<boolean> {
    if (this.cases.has(entry.caseId)) {
      return false;
    }
    this.cases.set(entry.caseId, structuredClone(CaseSchema.parse(entry)));
    return true;
  }

  async get(caseId: string): Promise<Case | null> {
    const found = this.cases.get(caseId);
    return found ? structuredClone(found) : null;
  }

  public size(): number {
    return this.cases.size;
  }
}

export function rankCases(cases: Case[], fingerprint: number[], k: number): ScoredCase[] {
  return cases
    .map((entry) => ({
      case: structuredClone(entry),
      similarity: cosineSimilarity(fingerprint, entry.fingerprint),
    }))
    .sort((a, b) => b.similarity - a.similarity || b.case.score - a.case.score)
    .slice(0, Math.max(0, k));
}
