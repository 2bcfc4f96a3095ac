import { z } from "zod";
import { getPostgresClient } from "../../clients/postgres.js";
import type { AgentDescriptor, KeywordRule, PayloadField } from "./types.js";

export interface AgentRegistryRow {
  agent_id: string;
  endpoint_url: string | null;
  requires_auth: boolean | null;
  needs_extra_context: boolean | null;
  enabled: boolean | null;
  description: string | null;
  payload_field: string | null;
  keywords: unknown;
  aliases: string[] | null;
}

/** Fields a collection entry sets; absent fields fall back to the static defaults. */
export type AgentOverride = { id: string } & Partial<Omit<AgentDescriptor, "id">>;

export interface AgentOverrideSourcePort {
  listOverrides: () => Promise<AgentOverride[]>;
}

const keywordRulesSchema = z.array(
  z.union([
    z.string().min(1).transform((term): KeywordRule => ({ term })),
    z.object({ term: z.string().min(1), weight: z.number().min(0).max(1).optional() })
  ])
);

const toPayloadField = (value: string | null): PayloadField | undefined =>
  value === "question" || value === "user_query" ? value : undefined;

const normalizeTrimmed = (value: string | null): string | null => {
  if (value === null) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

export const toAgentOverride = (row: AgentRegistryRow): AgentOverride => {
  const override: AgentOverride = { id: row.agent_id.trim() };
  const endpointUrl = normalizeTrimmed(row.endpoint_url);
  if (endpointUrl !== null) {
    override.endpointUrl = endpointUrl;
  }
  if (row.requires_auth !== null) {
    override.requiresAuth = row.requires_auth;
  }
  if (row.needs_extra_context !== null) {
    override.needsExtraContext = row.needs_extra_context;
  }
  if (row.enabled !== null) {
    override.enabled = row.enabled;
  }
  const description = normalizeTrimmed(row.description);
  if (description !== null) {
    override.description = description;
  }
  const payloadField = toPayloadField(row.payload_field);
  if (payloadField) {
    override.payloadField = payloadField;
  }
  const keywords = keywordRulesSchema.safeParse(row.keywords);
  if (row.keywords !== null && keywords.success) {
    override.keywords = keywords.data;
  }
  if (row.aliases !== null) {
    override.aliases = row.aliases.map((alias) => alias.trim()).filter((alias) => alias.length > 0);
  }
  return override;
};

export class AgentRegistryRepository implements AgentOverrideSourcePort {
  async listOverrides(): Promise<AgentOverride[]> {
    const { pool } = await getPostgresClient();
    const result = await pool.query<AgentRegistryRow>(
      `
        SELECT
          agent_id,
          endpoint_url,
          requires_auth,
          needs_extra_context,
          enabled,
          description,
          payload_field,
          keywords,
          aliases
        FROM agent_registry
        ORDER BY agent_id ASC
      `
    );

    return result.rows
      .filter((row) => row.agent_id.trim().length > 0)
      .map(toAgentOverride);
  }
}
