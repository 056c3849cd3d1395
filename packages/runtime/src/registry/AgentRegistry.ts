import type { Agent, AgentRegistry } from "../types/index.js";

export class InMemoryAgentRegistry implements AgentRegistry {
  private agents = new Map<string, Agent>();

  constructor(agents: Agent[] = []) {
    agents.forEach((agent) => {
      this.register(agent);
    });
  }

  public register(agent: Agent): void {
    if (this.agents.has(agent.name)) {
      console.warn(`[AgentRegistry] Replacing agent "${agent.name}"`);
    }
    this.agents.set(agent.name, agent);
  }

  public get(name: string): Agent | undefined {
    return this.agents.get(name);
  }

  public has(name: string): boolean {
    return this.agents.has(name);
  }

  public list(): Agent[] {
    return Array.from(this.agents.values());
  }
}
