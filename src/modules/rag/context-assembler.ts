import type { AssemblyOptions, ScoredDocument } from "./types.js";

export const NO_DOCUMENTS_CONTEXT = "no documents";
export const DEFAULT_MAX_TOTAL_CHARS = 3000;
export const DEFAULT_DOC_MAX_CHARS = 800;
export const DEFAULT_DOC_FALLBACK_CHARS = 400;
const SENTENCE_CUT_RATIO = 0.7;
const BLOCK_SEPARATOR = "\n\n";
const ELLIPSIS = "…";

const MARKDOWN_LINK_PATTERN = /!?\[([^\]]*)\]\(([^)]*)\)/g;
const HTML_ANCHOR_PATTERN = /<a\b[^>]*>([\s\S]*?)<\/a>/gi;
const RAW_URL_PATTERN = /\b(?:https?:\/\/|www\.)\S+/gi;
const WHITESPACE_PATTERN = /\s+/g;

export const cleanBody = (body: string): string =>
  body
    .replace(MARKDOWN_LINK_PATTERN, "$1")
    .replace(HTML_ANCHOR_PATTERN, "$1")
    .replace(RAW_URL_PATTERN, "")
    .replace(WHITESPACE_PATTERN, " ")
    .trim();

/** Result length never exceeds `limit`. */
export const truncateAtSentence = (text: string, limit: number): string => {
  if (text.length <= limit) {
    return text;
  }
  if (limit <= 0) {
    return "";
  }
  const window = text.slice(0, limit);
  const lastPeriod = window.lastIndexOf(".");
  if (lastPeriod > limit * SENTENCE_CUT_RATIO) {
    return window.slice(0, lastPeriod + 1);
  }
  return `${window.slice(0, limit - ELLIPSIS.length).trimEnd()}${ELLIPSIS}`;
};

const renderBlock = (position: number, candidate: ScoredDocument, body: string): string =>
  [
    `--- Document ${position} ---`,
    `Titre: ${candidate.document.title.replace(WHITESPACE_PATTERN, " ").trim()}`,
    `Source: ${candidate.document.sourceUrl}`,
    `Contenu: ${body}`
  ].join("\n");

/**
 * Renders ranked documents into a prompt context of at most `maxTotalChars`
 * characters. Documents are added in rank order until the next block no longer fits.
 */
export function assembleContext(
  rankedDocs: readonly ScoredDocument[],
  maxTotalChars: number = DEFAULT_MAX_TOTAL_CHARS,
  options: Omit<AssemblyOptions, "maxTotalChars"> = {}
): string {
  if (rankedDocs.length === 0) {
    return NO_DOCUMENTS_CONTEXT;
  }

  const docMaxChars = options.docMaxChars ?? DEFAULT_DOC_MAX_CHARS;
  const docFallbackChars = options.docFallbackChars ?? DEFAULT_DOC_FALLBACK_CHARS;
  const blocks: string[] = [];
  let used = 0;

  for (const [index, candidate] of rankedDocs.entries()) {
    const separatorLength = blocks.length > 0 ? BLOCK_SEPARATOR.length : 0;
    const remaining = maxTotalChars - used - separatorLength;
    const cleaned = cleanBody(candidate.document.body);

    let block = renderBlock(index + 1, candidate, truncateAtSentence(cleaned, docMaxChars));
    if (block.length > remaining) {
      block = renderBlock(index + 1, candidate, truncateAtSentence(cleaned, docFallbackChars));
    }
    if (block.length > remaining) {
      break;
    }

    blocks.push(block);
    used += separatorLength + block.length;
  }

  if (blocks.length === 0) {
    const [first] = rankedDocs;
    if (!first) {
      return NO_DOCUMENTS_CONTEXT;
    }
    return renderBlock(1, first, truncateAtSentence(cleanBody(first.document.body), docFallbackChars)).slice(
      0,
      Math.max(0, maxTotalChars)
    );
  }

  return blocks.join(BLOCK_SEPARATOR);
}
