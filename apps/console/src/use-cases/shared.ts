import type { AgentDefinition } from "@agentdeck/types";
import { withResources, type ResourceScope } from "@agentdeck/runtime";
import type { DemoContext } from "../context.js";

export function scoped<T>(ctx: DemoContext, body: (scope: ResourceScope) => Promise<T>): Promise<T> {
  return withResources(ctx.service, ctx.logger, body);
}

export function defineAgent(
  ctx: DemoContext,
  definition: Omit<AgentDefinition, "model">
): AgentDefinition {
  return { model: ctx.config.model, ...definition };
}
