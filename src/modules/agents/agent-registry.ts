import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { logInfo, logWarn, serializeError } from "../../observability/logger.js";
import type { AgentOverride, AgentOverrideSourcePort } from "./agent-registry-repository.js";
import type { AgentDescriptor, AgentRegistryPort } from "./types.js";

const keywordRuleSchema = z.object({
  term: z.string().min(1),
  weight: z.number().min(0).max(1).optional()
});

export const agentDescriptorSchema = z.object({
  id: z.string().min(1),
  endpointUrl: z.string().url().nullable(),
  requiresAuth: z.boolean().default(false),
  needsExtraContext: z.boolean().default(false),
  enabled: z.boolean().default(true),
  description: z.string().min(1),
  keywords: z.array(keywordRuleSchema).default([]),
  payloadField: z.enum(["question", "user_query"]).default("question"),
  aliases: z.array(z.string().min(1)).default([])
});

const agentRegistryFileSchema = z.object({
  agents: z.array(agentDescriptorSchema).min(1)
});

export const parseAgentRegistryFile = (raw: string): AgentDescriptor[] => {
  const parsed = agentRegistryFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "agents"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid agent registry file:\n${details}`);
  }
  return parsed.data.agents;
};

export const loadAgentDefaults = async (filePath: string): Promise<AgentDescriptor[]> => {
  const resolved = path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
  return parseAgentRegistryFile(await fs.readFile(resolved, "utf8"));
};

/**
 * Collection entries override the matching default field by field. An entry
 * with no default is kept only when it describes a complete agent.
 */
export const mergeAgentDescriptors = (
  defaults: readonly AgentDescriptor[],
  overrides: readonly AgentOverride[]
): { agents: AgentDescriptor[]; rejectedIds: string[] } => {
  const byId = new Map(overrides.map((override) => [override.id, override]));
  const agents = defaults.map((agent) => {
    const override = byId.get(agent.id);
    return override ? { ...agent, ...override, id: agent.id } : agent;
  });

  const knownIds = new Set(defaults.map((agent) => agent.id));
  const rejectedIds: string[] = [];
  for (const override of overrides) {
    if (knownIds.has(override.id)) {
      continue;
    }
    const complete = agentDescriptorSchema.safeParse({ endpointUrl: null, ...override });
    if (complete.success) {
      agents.push(complete.data);
    } else {
      rejectedIds.push(override.id);
    }
  }

  return { agents, rejectedIds };
};

export interface AgentRegistryOptions {
  loadDefaults: () => Promise<AgentDescriptor[]>;
  overrideSource?: AgentOverrideSourcePort | null;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

export class AgentRegistry implements AgentRegistryPort {
  private agents: readonly AgentDescriptor[] | null = null;
  private loading: Promise<readonly AgentDescriptor[]> | null = null;
  private readonly loadDefaults: () => Promise<AgentDescriptor[]>;
  private readonly overrideSource: AgentOverrideSourcePort | null;
  private readonly logInfo: typeof logInfo;
  private readonly logWarn: typeof logWarn;

  constructor(options: AgentRegistryOptions) {
    this.loadDefaults = options.loadDefaults;
    this.overrideSource = options.overrideSource ?? null;
    this.logInfo = options.logInfo ?? logInfo;
    this.logWarn = options.logWarn ?? logWarn;
  }

  async list(): Promise<readonly AgentDescriptor[]> {
    if (this.agents) {
      return this.agents;
    }
    return this.refresh();
  }

  async resolve(idOrAlias: string): Promise<AgentDescriptor | null> {
    const needle = idOrAlias.trim().toLowerCase();
    if (!needle) {
      return null;
    }
    const agents = await this.list();
    return (
      agents.find((agent) => agent.id.toLowerCase() === needle) ??
      agents.find((agent) => agent.aliases.some((alias) => alias.toLowerCase() === needle)) ??
      null
    );
  }

  refresh(): Promise<readonly AgentDescriptor[]> {
    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private async load(): Promise<readonly AgentDescriptor[]> {
    const defaults = await this.loadDefaults();
    let overrides: AgentOverride[] = [];
    if (this.overrideSource) {
      try {
        overrides = await this.overrideSource.listOverrides();
      } catch (error) {
        // Static defaults stay authoritative when the collection is unreachable.
        this.logWarn("agents.registry.overrides_failed", {}, { error: serializeError(error) });
      }
    }

    const { agents, rejectedIds } = mergeAgentDescriptors(defaults, overrides);
    if (rejectedIds.length > 0) {
      this.logWarn("agents.registry.incomplete_entries", {}, { agent_ids: rejectedIds });
    }

    const frozen = Object.freeze(agents.map((agent) => Object.freeze({ ...agent })));
    this.agents = frozen;
    this.logInfo("agents.registry.loaded", {}, {
      agent_count: frozen.length,
      override_count: overrides.length,
      agent_ids: frozen.map((agent) => agent.id)
    });
    return frozen;
  }
}
