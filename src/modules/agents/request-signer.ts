import { config } from "../../config/index.js";

export interface RequestSigner {
  /** Extra headers that authenticate a call to `audience`. */
  headersFor: (audience: string, signal?: AbortSignal) => Promise<Record<string, string>>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class NoopSigner implements RequestSigner {
  async headersFor(): Promise<Record<string, string>> {
    return {};
  }
}

export class StaticBearerSigner implements RequestSigner {
  constructor(private readonly token: string) {}

  async headersFor(): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${this.token}` };
  }
}

const IDENTITY_TOKEN_TTL_MS = 50 * 60 * 1000;

export interface MetadataIdentitySignerOptions {
  tokenUrl: string;
  fetch?: FetchLike;
  now?: () => number;
  ttlMs?: number;
}

/**
 * Obtains an identity token for the target endpoint from the instance
 * metadata server. Tokens are cached per audience.
 */
export class MetadataIdentitySigner implements RequestSigner {
  private readonly tokens = new Map<string, { token: string; expiresAt: number }>();
  private readonly tokenUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private readonly ttlMs: number;

  constructor(options: MetadataIdentitySignerOptions) {
    this.tokenUrl = options.tokenUrl;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
    this.ttlMs = options.ttlMs ?? IDENTITY_TOKEN_TTL_MS;
  }

  async headersFor(audience: string, signal?: AbortSignal): Promise<Record<string, string>> {
    const cached = this.tokens.get(audience);
    if (cached && cached.expiresAt > this.now()) {
      return { Authorization: `Bearer ${cached.token}` };
    }

    const url = new URL(this.tokenUrl);
    url.searchParams.set("audience", audience);
    const response = await this.fetchImpl(url.toString(), {
      method: "GET",
      headers: { "Metadata-Flavor": "Google" },
      signal
    });
    if (!response.ok) {
      throw new Error(`Identity token request failed with status ${response.status}`);
    }
    const token = (await response.text()).trim();
    if (!token) {
      throw new Error("Identity token response was empty");
    }

    this.tokens.set(audience, { token, expiresAt: this.now() + this.ttlMs });
    return { Authorization: `Bearer ${token}` };
  }
}

export const createRequestSigner = (source: {
  AGENT_AUTH_MODE: "none" | "static" | "metadata";
  AGENT_BEARER_TOKEN?: string;
  IDENTITY_TOKEN_URL: string;
} = config): RequestSigner => {
  switch (source.AGENT_AUTH_MODE) {
    case "static":
      if (!source.AGENT_BEARER_TOKEN) {
        throw new Error("AGENT_BEARER_TOKEN is required when AGENT_AUTH_MODE=static");
      }
      return new StaticBearerSigner(source.AGENT_BEARER_TOKEN);
    case "metadata":
      return new MetadataIdentitySigner({ tokenUrl: source.IDENTITY_TOKEN_URL });
    case "none":
      return new NoopSigner();
  }
};
