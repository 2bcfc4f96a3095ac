export type PayloadField = "question" | "user_query";

export type KeywordRule = {
  term: string;
  weight?: number;
};

export type AgentDescriptor = {
  id: string;
  /** `null` when the agent is declared but not deployed yet. */
  endpointUrl: string | null;
  requiresAuth: boolean;
  needsExtraContext: boolean;
  enabled: boolean;
  description: string;
  keywords: KeywordRule[];
  payloadField: PayloadField;
  /** Other names the agent answers to in handoff metadata. */
  aliases: string[];
};

export type AgentPayload = Record<string, unknown>;

export type InvocationResult = {
  statusCode: number;
  body: string;
};

export interface AgentRegistryPort {
  list: () => Promise<readonly AgentDescriptor[]>;
  resolve: (idOrAlias: string) => Promise<AgentDescriptor | null>;
}
