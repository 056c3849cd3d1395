import type { Artifact, ObjectStore, Step, StepRecord } from "../types/index.js";

export interface ArtifactSource {
  plan: readonly Step[];
  stepRecords: Record<string, StepRecord>;
  outputs: Record<string, Record<string, unknown>>;
}

/**
 * 最终产物文本：最后一个成功步骤中带 text 字段的输出；都没有时为全部输出的 JSON。
 */
export function selectArtifactText(source: ArtifactSource): { text: string; mediaType: string } | null {
  for (let index = source.plan.length - 1; index >= 0; index -= 1) {
    const step = source.plan[index];
    if (!step || source.stepRecords[step.id]?.status !== "succeeded") continue;
    const text = source.outputs[step.agent]?.text;
    if (typeof text === "string" && text.trim().length > 0) {
      return { text, mediaType: "text/plain" };
    }
  }
  if (Object.keys(source.outputs).length === 0) {
    return null;
  }
  return { text: JSON.stringify(source.outputs, null, 2), mediaType: "application/json" };
}

export async function materializeArtifact(
  taskId: string,
  selected: { text: string; mediaType: string },
  inlineLimitBytes: number,
  objectStore: ObjectStore
): Promise<Artifact> {
  const sizeBytes = Buffer.byteLength(selected.text, "utf-8");
  if (sizeBytes <= inlineLimitBytes) {
    return { kind: "inline", content: selected.text, mediaType: selected.mediaType };
  }
  const extension = selected.mediaType === "application/json" ? "json" : "txt";
  const uri = await objectStore.put(selected.text, {
    key: `${taskId}/artifact.${extension}`,
    mediaType: selected.mediaType,
  });
  return { kind: "blob", uri, sizeBytes, mediaType: selected.mediaType };
}
