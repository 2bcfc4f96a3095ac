import { describe, expect, it, vi } from "vitest";
import {
  MetadataIdentitySigner,
  NoopSigner,
  StaticBearerSigner,
  createRequestSigner,
  type FetchLike
} from "../../src/modules/agents/request-signer.js";
import { createTextResponse } from "../../tests/helpers/fetch-mocks.js";

const AUDIENCE = "https://juridique.agents.example.com/ask";
const TOKEN_URL = "http://metadata.test/identity";

describe("modules/agents/request-signer", () => {
  it("adds a static bearer token", async () => {
    await expect(new StaticBearerSigner("test-token").headersFor()).resolves.toEqual({
      Authorization: "Bearer test-token"
    });
  });

  it("fetches an identity token for the audience and caches it", async () => {
    let clock = 0;
    const fetch = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(async () => createTextResponse("test-identity\n"));
    const signer = new MetadataIdentitySigner({ tokenUrl: TOKEN_URL, fetch, now: () => clock, ttlMs: 1_000 });

    await expect(signer.headersFor(AUDIENCE)).resolves.toEqual({ Authorization: "Bearer test-identity" });
    clock = 999;
    await signer.headersFor(AUDIENCE);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledWith(
      "http://metadata.test/identity?audience=https%3A%2F%2Fjuridique.agents.example.com%2Fask",
      { method: "GET", headers: { "Metadata-Flavor": "Google" }, signal: undefined }
    );

    clock = 1_000;
    await signer.headersFor(AUDIENCE);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("fails when the metadata server refuses or answers empty", async () => {
    const refused = new MetadataIdentitySigner({
      tokenUrl: TOKEN_URL,
      fetch: async () => createTextResponse("nope", { status: 404 })
    });
    const empty = new MetadataIdentitySigner({ tokenUrl: TOKEN_URL, fetch: async () => createTextResponse("  ") });

    await expect(refused.headersFor(AUDIENCE)).rejects.toThrow("Identity token request failed with status 404");
    await expect(empty.headersFor(AUDIENCE)).rejects.toThrow("Identity token response was empty");
  });

  it("builds the signer for the configured mode", () => {
    expect(createRequestSigner({ AGENT_AUTH_MODE: "none", IDENTITY_TOKEN_URL: TOKEN_URL })).toBeInstanceOf(NoopSigner);
    expect(
      createRequestSigner({ AGENT_AUTH_MODE: "static", AGENT_BEARER_TOKEN: "test-token", IDENTITY_TOKEN_URL: TOKEN_URL })
    ).toBeInstanceOf(StaticBearerSigner);
    expect(createRequestSigner({ AGENT_AUTH_MODE: "metadata", IDENTITY_TOKEN_URL: TOKEN_URL })).toBeInstanceOf(
      MetadataIdentitySigner
    );
    expect(() => createRequestSigner({ AGENT_AUTH_MODE: "static", IDENTITY_TOKEN_URL: TOKEN_URL })).toThrow(
      "AGENT_BEARER_TOKEN is required when AGENT_AUTH_MODE=static"
    );
  });
});
