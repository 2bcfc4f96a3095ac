import { describe, expect, it, vi } from "vitest";
import {
  ResponseNormalizer,
  normalizeResponse,
  sanitizePayload,
  stripCodeFence
} from "../../src/modules/agents/response-normalizer.js";

const fencedAgentReply = (): string =>
  [
    "```json",
    JSON.stringify({
      reponse: "```\nLa TVA est un impôt sur la consommation.\n```",
      sources_officielles: [{ titre: "BOFiP TVA", lien: "https://bofip.example.fr/tva" }, "https://impots.example.fr/tva"],
      handoff: { needed: false, suggested_agent: "none" },
      confiance: 0.9
    }),
    "```"
  ].join("\n");

describe("modules/agents/response-normalizer", () => {
  it("strips nested and inline code fences", () => {
    expect(stripCodeFence("```json\n{\"a\":1}\n```")).toBe("{\"a\":1}");
    expect(stripCodeFence("```\n```md\nTexte\n```\n```")).toBe("Texte");
    expect(stripCodeFence("```La TVA```")).toBe("La TVA");
    expect(stripCodeFence("Pas de bloc")).toBe("Pas de bloc");
  });

  it("normalizes a fenced agent reply with French field names", () => {
    expect(normalizeResponse(fencedAgentReply())).toEqual({
      answerText: "La TVA est un impôt sur la consommation.",
      sources: [
        { title: "BOFiP TVA", url: "https://bofip.example.fr/tva" },
        { title: "https://impots.example.fr/tva", url: "https://impots.example.fr/tva" }
      ],
      extraFields: { confiance: 0.9 }
    });
  });

  it("is idempotent", () => {
    const payloads: unknown[] = [
      fencedAgentReply(),
      { answer: "A", reponse: "R", references: [{ name: "Code civil", href: "https://legi.example.fr" }] },
      { texte: "Oui", handoff: { needed: true, target_agent: "juridique" } },
      "Réponse brute",
      { sources: [] }
    ];

    for (const payload of payloads) {
      const once = normalizeResponse(payload);
      expect(normalizeResponse(once)).toEqual(once);
    }
  });

  it("prefers earlier answer keys and keeps the others as extra fields", () => {
    expect(normalizeResponse({ answer: "A", reponse: "  R  ", explanation: "E" })).toEqual({
      answerText: "R",
      sources: [],
      extraFields: { answer: "A", explanation: "E" }
    });
  });

  it("keeps an active handoff and drops an inert one", () => {
    expect(normalizeResponse({ reponse: "R", handoff: { needed: true, target_agent: "juridique" } }).extraFields).toEqual({
      handoff: { needed: true, target_agent: "juridique" }
    });
    expect(normalizeResponse({ reponse: "R", handoff: { needed: false } }).extraFields).toEqual({});
  });

  it("merges source aliases and removes duplicates", () => {
    const normalized = normalizeResponse({
      reponse: "R",
      sources: [{ title: "Code du travail", url: "https://travail.example.fr" }, 42, { titre: "" }],
      references: [{ name: "Code du travail", href: "https://travail.example.fr" }],
      citations: { label: "Urssaf" }
    });

    expect(normalized.sources).toEqual([
      { title: "Code du travail", url: "https://travail.example.fr" },
      { title: "Urssaf", url: "" }
    ]);
  });

  it("falls back to the raw text for non-object payloads", () => {
    expect(normalizeResponse("  Réponse brute  ")).toEqual({ answerText: "Réponse brute", sources: [], extraFields: {} });
    expect(normalizeResponse("\"bonjour\"")).toEqual({ answerText: "bonjour", sources: [], extraFields: {} });
    expect(normalizeResponse("[1,2]").answerText).toBe("[1,2]");
    expect(normalizeResponse(null).answerText).toBe("");
  });

  it("sanitizes without reshaping", () => {
    expect(sanitizePayload("{\"reponse\":\"```\\nOui\\n```\",\"handoff\":{\"needed\":false},\"n\":1}")).toEqual({
      reponse: "Oui",
      n: 1
    });
    expect(sanitizePayload("```\nTexte\n```")).toBe("Texte");
  });

  it("logs malformed payloads with the request context", () => {
    const logWarn = vi.fn();
    const normalizer = new ResponseNormalizer({ logWarn });

    normalizer.normalize("Réponse brute", { requestId: "req-1", agentId: "aides" });
    normalizer.normalize("[1,2]");
    normalizer.normalize("{\"reponse\":\"ok\"}");

    expect(logWarn).toHaveBeenCalledTimes(2);
    expect(logWarn).toHaveBeenNthCalledWith(1, "agents.response.malformed", { requestId: "req-1", agentId: "aides" }, {
      error: "Agent payload is not valid JSON",
      body_chars: 13
    });
    expect(logWarn).toHaveBeenNthCalledWith(2, "agents.response.malformed", { requestId: null, agentId: null }, {
      error: "Agent payload is JSON but not an object",
      body_chars: 5
    });
  });
});
