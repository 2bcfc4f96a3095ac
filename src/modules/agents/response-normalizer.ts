import { logWarn } from "../../observability/logger.js";
import { MalformedResponseError } from "../errors.js";

export type SourceReference = {
  title: string;
  url: string;
};

export type NormalizedResponse = {
  answerText: string;
  sources: SourceReference[];
  extraFields: Record<string, unknown>;
};

type ParsedPayload =
  | { kind: "json"; value: Record<string, unknown> }
  | { kind: "text"; text: string; parseError: unknown };

// `answerText` first, so a normalized payload re-reads its own answer.
const ANSWER_KEYS = ["answerText", "reponse", "answer", "response", "texte", "text", "explanation"] as const;
const SOURCE_LIST_KEYS = ["sources", "sources_officielles", "references", "citations", "documents"] as const;
const SOURCE_TITLE_KEYS = ["title", "titre", "nom", "name", "label"] as const;
const SOURCE_URL_KEYS = ["url", "lien", "source_url", "link", "href"] as const;

// A language tag is only read when the fence line ends right after it.
const CODE_FENCE_PATTERN = /^\s*```(?:[\w+-]*[^\S\r\n]*\r?\n)?([\s\S]*?)(?:\r?\n)?[^\S\r\n]*```\s*$/;

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Removes fences wrapping the whole string, however deeply nested. */
export const stripCodeFence = (text: string): string => {
  let current = text;
  for (;;) {
    const match = CODE_FENCE_PATTERN.exec(current);
    if (!match) {
      return current;
    }
    current = (match[1] ?? "").trim();
  }
};

export const parsePayload = (raw: unknown): ParsedPayload => {
  if (isPlainObject(raw)) {
    return { kind: "json", value: raw };
  }
  const text = typeof raw === "string" ? stripCodeFence(raw.trim()) : raw === null || raw === undefined ? "" : String(raw);
  try {
    const parsed: unknown = JSON.parse(text);
    if (isPlainObject(parsed)) {
      return { kind: "json", value: parsed };
    }
    return {
      kind: "text",
      text: typeof parsed === "string" ? parsed : text,
      parseError: new MalformedResponseError("Agent payload is JSON but not an object")
    };
  } catch (error) {
    return { kind: "text", text, parseError: error };
  }
};

const isInertHandoff = (value: unknown): boolean => isPlainObject(value) && value.needed === false;

const sanitizeObject = (value: Record<string, unknown>): Record<string, unknown> => {
  const sanitized: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    if (key === "handoff" && isInertHandoff(field)) {
      continue;
    }
    sanitized[key] = typeof field === "string" ? stripCodeFence(field) : field;
  }
  return sanitized;
};

/**
 * Cleans a raw agent payload without reshaping it: inert handoff metadata is
 * dropped and code fences are stripped from top-level strings.
 */
export const sanitizePayload = (raw: unknown): Record<string, unknown> | string => {
  const parsed = parsePayload(raw);
  return parsed.kind === "json" ? sanitizeObject(parsed.value) : parsed.text;
};

const firstString = (source: Record<string, unknown>, keys: readonly string[]): string | undefined => {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
};

const toSourceReference = (item: unknown): SourceReference | null => {
  if (typeof item === "string") {
    const trimmed = item.trim();
    return trimmed ? { title: trimmed, url: trimmed } : null;
  }
  if (!isPlainObject(item)) {
    return null;
  }
  const url = firstString(item, SOURCE_URL_KEYS) ?? "";
  const title = firstString(item, SOURCE_TITLE_KEYS) ?? url;
  return title ? { title, url } : null;
};

const collectSources = (value: Record<string, unknown>): SourceReference[] => {
  const sources: SourceReference[] = [];
  const seen = new Set<string>();
  for (const key of SOURCE_LIST_KEYS) {
    const field = value[key];
    const items = Array.isArray(field) ? field : field === undefined ? [] : [field];
    for (const item of items) {
      const reference = toSourceReference(item);
      if (!reference) {
        continue;
      }
      const identity = `${reference.title}\u0000${reference.url}`;
      if (seen.has(identity)) {
        continue;
      }
      seen.add(identity);
      sources.push(reference);
    }
  }
  return sources;
};

const isNormalizedShape = (value: Record<string, unknown>): boolean =>
  typeof value.answerText === "string" && Array.isArray(value.sources) && isPlainObject(value.extraFields);

const flattenNormalized = (value: Record<string, unknown>): Record<string, unknown> => {
  if (!isNormalizedShape(value) || !isPlainObject(value.extraFields)) {
    return value;
  }
  return { ...value.extraFields, answerText: value.answerText, sources: value.sources };
};

export const normalizeParsed = (parsed: ParsedPayload): NormalizedResponse => {
  if (parsed.kind === "text") {
    return { answerText: parsed.text.trim(), sources: [], extraFields: {} };
  }

  const sanitized = sanitizeObject(flattenNormalized(parsed.value));
  const answerKey = ANSWER_KEYS.find((key) => {
    const field = sanitized[key];
    return typeof field === "string" && field.trim().length > 0;
  });
  const answerValue = answerKey ? sanitized[answerKey] : undefined;
  const answerText = typeof answerValue === "string" ? answerValue.trim() : "";
  const sources = collectSources(sanitized);

  const consumed = new Set<string>([...SOURCE_LIST_KEYS, "answerText"]);
  if (answerKey) {
    consumed.add(answerKey);
  }
  const extraFields = Object.fromEntries(Object.entries(sanitized).filter(([key]) => !consumed.has(key)));

  return { answerText, sources, extraFields };
};

/** Pure and idempotent: `normalizeResponse(normalizeResponse(x))` equals `normalizeResponse(x)`. */
export const normalizeResponse = (raw: unknown): NormalizedResponse => normalizeParsed(parsePayload(raw));

export interface ResponseNormalizerDependencies {
  logWarn?: typeof logWarn;
}

export class ResponseNormalizer {
  private readonly logWarn: typeof logWarn;

  constructor(dependencies?: ResponseNormalizerDependencies) {
    this.logWarn = dependencies?.logWarn ?? logWarn;
  }

  normalize(raw: unknown, context: { requestId?: string; agentId?: string } = {}): NormalizedResponse {
    const parsed = parsePayload(raw);
    if (parsed.kind === "text") {
      const error =
        parsed.parseError instanceof MalformedResponseError
          ? parsed.parseError
          : new MalformedResponseError("Agent payload is not valid JSON", { cause: parsed.parseError });
      this.logWarn(
        "agents.response.malformed",
        { requestId: context.requestId ?? null, agentId: context.agentId ?? null },
        { error: error.message, body_chars: parsed.text.length }
      );
    }
    return normalizeParsed(parsed);
  }
}
