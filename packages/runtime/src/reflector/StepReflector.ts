import type {
  ReflectInput,
  ReflectionDirective,
  ReflectionResult,
  Reflector,
} from "../types/index.js";

/**
 * 根据单步执行结果决定下一动作：
 * 成功推进；失败且仍有尝试次数则原样重试；否则记失败标记并跳过。
 */
export class StepReflector implements Reflector {
  async reflect(input: ReflectInput): Promise<ReflectionResult> {
    const { outcome, maxAttempts } = input;
    const { step, attempt } = outcome;

    if (!outcome.error) {
      const hints = outcome.response?.nextSteps?.length ?? 0;
      return this.buildResult(
        "advance",
        hints > 0
          ? `Step "${step.title}" succeeded and requested ${hints} follow-up step(s)`
          : `Step "${step.title}" succeeded, moving to the next item`
      );
    }

    if (attempt < maxAttempts) {
      return this.buildResult(
        "retry",
        `Step "${step.title}" failed (attempt ${attempt}/${maxAttempts}), retrying with the same payload`
      );
    }

    return this.buildResult(
      "skip",
      `Step "${step.title}" failed after ${attempt} attempt(s), continuing with the rest of the plan`
    );
  }

  private buildResult(directive: ReflectionDirective, message: string): ReflectionResult {
    return { directive, message };
  }
}
