import { vi } from "vitest";
import type { FetchLike } from "../../src/modules/agents/request-signer.js";

type ResponseInitLike = {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
};

export function createJsonResponse(body: unknown, init: ResponseInitLike = {}): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    statusText: init.statusText,
    headers: {
      "Content-Type": "application/json",
      ...(init.headers ?? {})
    }
  });
}

export function createTextResponse(body: string, init: ResponseInitLike = {}): Response {
  return new Response(body, {
    status: init.status ?? 200,
    statusText: init.statusText,
    headers: init.headers
  });
}

/** A fetch that never answers; it rejects only once its signal aborts. */
export function createHangingFetch() {
  return vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) {
          return;
        }
        const abort = (): void => reject(new DOMException("The operation was aborted.", "AbortError"));
        if (signal.aborted) {
          abort();
          return;
        }
        signal.addEventListener("abort", abort, { once: true });
      })
  );
}
