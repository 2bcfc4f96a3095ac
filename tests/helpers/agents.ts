import type { AgentDescriptor } from "../../src/modules/agents/types.js";

export const makeAgent = (overrides: Partial<AgentDescriptor> & Pick<AgentDescriptor, "id">): AgentDescriptor => ({
  endpointUrl: `https://${overrides.id}.agents.example.com/ask`,
  requiresAuth: false,
  needsExtraContext: false,
  enabled: true,
  description: `Agent ${overrides.id}`,
  keywords: [],
  payloadField: "question",
  aliases: [],
  ...overrides
});

export const TEST_AGENTS: AgentDescriptor[] = [
  makeAgent({
    id: "fiscalite",
    description: "Fiscalité des entreprises",
    keywords: [{ term: "tva" }, { term: "impôt" }, { term: "is", weight: 0.3 }],
    aliases: ["fiscal"]
  }),
  makeAgent({
    id: "juridique",
    description: "Droit des sociétés et contrats",
    keywords: [{ term: "contrat" }, { term: "statuts" }, { term: "bail commercial" }],
    payloadField: "user_query",
    needsExtraContext: true,
    aliases: ["legal", "droit"]
  }),
  makeAgent({ id: "comptabilite", endpointUrl: null, keywords: [{ term: "bilan" }], aliases: ["compta"] })
];
