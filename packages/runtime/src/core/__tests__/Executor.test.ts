import { describe, expect, it } from "vitest";
import type { AgentResponse, BusEvent, Step } from "../../types/index.js";
import { Executor } from "../Executor.js";
import { EventBus } from "../../event/EventBus.js";
import { InMemoryAgentRegistry } from "../../registry/AgentRegistry.js";
import { ProviderError, StepFailureError } from "../errors.js";
import { fail, succeed } from "../../agents/response.js";
import { hangingAgent, invocation, stubAgent } from "../../__tests__/fixtures.js";

const step: Step = {
  id: "s1",
  agent: "weather",
  title: "Forecast",
  payload: { location: "Oslo" },
  origin: "planner",
};

function setup(stepTimeoutMs = 1_000) {
  const registry = new InMemoryAgentRegistry();
  const eventBus = new EventBus();
  const published: BusEvent[] = [];
  eventBus.events().subscribe((event) => published.push(event));
  const executor = new Executor({ agentRegistry: registry, eventBus, stepTimeoutMs });
  return { registry, executor, published };
}

function draft() {
  const { signal: _signal, ...rest } = invocation({ step, payload: step.payload });
  return rest;
}

describe("Executor", () => {
  it("rejects unknown agents", async () => {
    const { executor } = setup();
    await expect(executor.invoke("ghost", draft())).rejects.toThrow(
      new StepFailureError("Agent ghost is not registered", "StepFailure")
    );
  });

  it("validates agent responses", async () => {
    const { registry, executor } = setup();
    const malformed: AgentResponse = JSON.parse('{"success": true, "output": {}}');
    registry.register(stubAgent("weather", async () => malformed));
    await expect(executor.invoke("weather", draft())).rejects.toThrow(
      /^Agent weather returned a malformed response/
    );
  });

  it("folds a successful step into an outcome and announces it", async () => {
    const { registry, executor, published } = setup();
    registry.register(stubAgent("weather", async (context) => succeed({ text: `sunny in ${String(context.payload.location)}` })));

    const outcome = await executor.execute({ step, stepIndex: 0, attempt: 1, invocation: draft() });
    expect(outcome.error).toBeNull();
    expect(outcome.response?.output).toEqual({ text: "sunny in Oslo" });
    expect(published.map((event) => event.type)).toEqual(["step.request", "step.result"]);
    expect(published[1]?.payload).toMatchObject({ agent: "weather", stepId: "s1", success: true });
    expect(published[1]?.traceId).toBe("task-test");
  });

  it("turns a reported failure into a StepFailure outcome", async () => {
    const { registry, executor } = setup();
    registry.register(stubAgent("weather", async () => fail("station offline")));
    const outcome = await executor.execute({ step, stepIndex: 0, attempt: 2, invocation: draft() });
    expect(outcome.response?.success).toBe(false);
    expect(outcome.error).toEqual({ kind: "StepFailure", message: "station offline" });
    expect(outcome.attempt).toBe(2);
  });

  it("keeps the underlying error kind of a thrown failure", async () => {
    const { registry, executor, published } = setup();
    registry.register(
      stubAgent("weather", async () => {
        throw new ProviderError("quota exhausted");
      })
    );
    const outcome = await executor.execute({ step, stepIndex: 0, attempt: 1, invocation: draft() });
    expect(outcome.response).toBeNull();
    expect(outcome.error).toEqual({ kind: "ProviderError", message: "Agent weather failed: quota exhausted" });
    expect(published[1]?.payload.success).toBe(false);
  });

  it("times out a hanging agent and aborts it", async () => {
    const { registry, executor } = setup(20);
    let aborted = false;
    registry.register({
      ...hangingAgent("weather"),
      invoke: (context) => {
        context.signal.addEventListener("abort", () => {
          aborted = true;
        });
        return hangingAgent("weather").invoke(context);
      },
    });
    const outcome = await executor.execute({ step, stepIndex: 0, attempt: 1, invocation: draft() });
    expect(outcome.error).toEqual({ kind: "StepTimeout", message: "Agent weather timed out after 20ms" });
    expect(aborted).toBe(true);
  });
});
