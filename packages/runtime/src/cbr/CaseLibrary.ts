import { nanoid } from "nanoid";
import type { Case, CaseStore, Embedder, ScoredCase, Step } from "../types/index.js";
import { fnv1a } from "./similarity.js";

export interface CaseLibraryOptions {
  store: CaseStore;
  embedder: Embedder;
  topK: number;
  similarityThreshold: number;
  now?: () => number;
}

export interface GoalFingerprint {
  vector: number[];
  key: string;
}

export interface CaseWriteInput {
  goal: string;
  entities: string[];
  plan: Step[];
  score: number;
}

export interface CaseWriteResult {
  caseId: string;
  written: boolean;
}

export function fingerprintKey(goal: string): string {
  const canonical = goal
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
  return fnv1a(canonical);
}

/** 计划哈希不含步骤 ID，改写后的同一计划得到相同哈希 */
export function planHash(plan: Step[]): string {
  const indexById = new Map(plan.map((step, index) => [step.id, index]));
  const canonical = plan.map((step) => ({
    agent: step.agent,
    title: step.title,
    payload: step.payload,
    dependsOn: (step.dependsOn ?? []).map((id) => indexById.get(id) ?? id),
  }));
  return fnv1a(JSON.stringify(canonical));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function substitute(value: unknown, replacements: Array<[RegExp, string]>): unknown {
  if (typeof value === "string") {
    return replacements.reduce((text, [pattern, next]) => text.replace(pattern, next), value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => substitute(item, replacements));
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, substitute(item, replacements)])
    );
  }
  return value;
}

/**
 * 基于案例的推理：检索相似目标的历史计划、按实体替换改写，以及幂等写回。
 * 存储中的案例从不修改，改写总是作用在副本上。
 */
export class CaseLibrary {
  private readonly options: CaseLibraryOptions;

  constructor(options: CaseLibraryOptions) {
    this.options = options;
  }

  public get similarityThreshold(): number {
    return this.options.similarityThreshold;
  }

  async fingerprint(goal: string): Promise<GoalFingerprint> {
    return {
      vector: await this.options.embedder.embed(goal),
      key: fingerprintKey(goal),
    };
  }

  /** 返回 top-K 候选（含相似度），由调用方按阈值筛选 */
  async retrieve(goal: string): Promise<ScoredCase[]> {
    const { vector } = await this.fingerprint(goal);
    return this.options.store.topK(vector, this.options.topK);
  }

  async findMatch(goal: string): Promise<{ candidates: ScoredCase[]; match: ScoredCase | null }> {
    const candidates = await this.retrieve(goal);
    const match =
      candidates.find((candidate) => candidate.similarity >= this.options.similarityThreshold) ??
      null;
    return { candidates, match };
  }

  /**
   * 复制案例计划：旧实体按位置替换为新实体，重新生成步骤 ID，步骤数保持不变。
   */
  adapt(source: Case, entities: string[]): Step[] {
    const replacements: Array<[RegExp, string]> = [];
    source.entities.forEach((previous, index) => {
      const next = entities[index];
      if (next !== undefined && next !== previous) {
        replacements.push([new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(previous)}(?![\\p{L}\\p{N}])`, "gu"), next]);
      }
    });

    const idMap = new Map(source.plan.map((step) => [step.id, nanoid(10)]));
    return source.plan.map((step) => {
      const payload = substitute(step.payload, replacements);
      return {
        id: idMap.get(step.id) ?? nanoid(10),
        agent: step.agent,
        title: String(substitute(step.title, replacements)),
        payload: isRecord(payload) ? payload : {},
        ...(step.dependsOn
          ? { dependsOn: step.dependsOn.map((id) => idMap.get(id) ?? id) }
          : {}),
        origin: "case" as const,
      };
    });
  }

  async writeBack(input: CaseWriteInput): Promise<CaseWriteResult> {
    const { vector, key } = await this.fingerprint(input.goal);
    const hash = planHash(input.plan);
    const caseId = `${key}:${hash}`;
    const written = await this.options.store.write({
      caseId,
      fingerprint: vector,
      fingerprintKey: key,
      goal: input.goal,
      entities: input.entities,
      plan: input.plan,
      planHash: hash,
      score: input.score,
      createdAt: (this.options.now ?? Date.now)(),
    });
    return { caseId, written };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
