import { evaluate, format } from "mathjs";
import type { Agent, AgentInvocation, AgentResponse } from "../types/index.js";
import { extractExpression } from "../planner/planRules.js";
import { describeError } from "../core/errors.js";
import { fail, readString, succeed } from "./response.js";

export class CalculatorAgent implements Agent {
  public readonly name = "calculator";

  public readonly description =
    'Evaluates a mathematical expression from payload.expression, e.g. "2 * (3 + 4)".';

  async invoke(context: AgentInvocation): Promise<AgentResponse> {
    const task = readString(context.payload, "task") ?? context.goal;
    const expression = readString(context.payload, "expression") ?? extractExpression(task);

    if (!expression) {
      return fail("Missing expression parameter", { task });
    }

    try {
      const value: unknown = evaluate(expression);
      const result = format(value, { precision: 14 });
      return succeed(
        { expression, result, text: `${expression} = ${result}` },
        { message: "Expression evaluated" }
      );
    } catch (error) {
      return fail(`Failed to evaluate expression: ${describeError(error)}`, { expression });
    }
  }
}
