import { describe, expect, it } from "vitest";
import {
  PerceptorAgent,
  classifyIntent,
  estimateComplexity,
  extractEntities,
  splitSubtasks,
} from "../PerceptorAgent.js";
import { invocation } from "../../__tests__/fixtures.js";

describe("perception rules", () => {
  it("classifies intents by keyword", () => {
    expect(classifyIntent("What is the weather in Paris tomorrow?")).toBe("weather");
    expect(classifyIntent("Calculate 2 + 3")).toBe("calculation");
    expect(classifyIntent("Draw a diagram of the network")).toBe("visual");
    expect(classifyIntent("Write a report on solar power")).toBe("writing");
    expect(classifyIntent("hello there")).toBe("unknown");
  });

  it("extracts quoted phrases, capitalized runs and numbers", () => {
    expect(extractEntities('Compare "Model X" with Tesla Roadster and BMW')).toEqual([
      "Model X",
      "Tesla Roadster",
      "BMW",
    ]);
    expect(extractEntities("Calculate 12 plus 7")).toEqual(["12", "7"]);
    expect(extractEntities("What is the weather in Paris tomorrow?")).toEqual(["Paris"]);
  });

  it("splits goals on bullets, semicolons and 'then'", () => {
    expect(splitSubtasks("- Search for hotels\n- Book a table")).toEqual([
      "Search for hotels",
      "Book a table",
    ]);
    expect(splitSubtasks("Find the population of Oslo, then write a summary")).toEqual([
      "Find the population of Oslo",
      "write a summary",
    ]);
    expect(splitSubtasks("Plot sales; explain the trend")).toEqual(["Plot sales", "explain the trend"]);
    expect(splitSubtasks("")).toEqual([]);
  });

  it("grades complexity by length and subtask count", () => {
    expect(estimateComplexity("short goal", ["short goal"])).toBe("low");
    expect(estimateComplexity("a b c d e f g h i j k l m", ["x"])).toBe("medium");
    expect(estimateComplexity("a b", ["1", "2", "3", "4"])).toBe("high");
  });
});

describe("PerceptorAgent", () => {
  it("produces a structured descriptor", async () => {
    const goal = "What is the weather in Paris tomorrow?";
    const response = await new PerceptorAgent().invoke(invocation({ goal }));
    expect(response.success).toBe(true);
    expect(response.output.descriptor).toEqual({
      rawGoal: goal,
      normalizedGoal: goal,
      intent: "weather",
      entities: ["Paris"],
      complexity: "low",
      subtasks: [goal],
    });
    expect(response.events).toEqual([
      {
        kind: "info",
        message: "Intent weather, 1 subtask(s), complexity low",
        payload: { entities: ["Paris"] },
      },
    ]);
  });

  it("passes an unstructured goal through with a warning", async () => {
    const response = await new PerceptorAgent().invoke(invocation({ goal: "hello  there" }));
    expect(response.output.descriptor).toMatchObject({
      normalizedGoal: "hello there",
      intent: "unknown",
      entities: [],
    });
    expect(response.events[0]?.kind).toBe("warning");
  });
});
