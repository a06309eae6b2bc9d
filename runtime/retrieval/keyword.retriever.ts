import fs from "node:fs";
import { fileURLToPath } from "node:url";
import type { RetrieverPort } from "../../src/core/retrieval/retriever.port";
import type { KnowledgeSnippet } from "../../src/core/turn/turn.types";

export interface KnowledgeEntry {
  readonly id: string;
  readonly text: string;
}

export interface KeywordRetrieverOptions {
  readonly topK?: number;
}

export const DEFAULT_KNOWLEDGE_PATH = fileURLToPath(
  new URL("../../data/knowledge.json", import.meta.url)
);
const DEFAULT_TOP_K = 3;
const MIN_TOKEN_LENGTH = 2;
const STOPWORDS = new Set(["알려줘", "알려주세요", "해줘", "추천해줘", "만들어줘", "어떻게", "방법", "좀"]);
const TRAILING_PARTICLE = /(?:으로|에서|에는|이랑|하고|을|를|이|가|은|는|에|로|와|과|도)$/;

function tokenize(text: string): readonly string[] {
  const tokens = text
    .normalize("NFC")
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .map((token) => {
      const stripped = token.replace(TRAILING_PARTICLE, "");
      return stripped.length >= MIN_TOKEN_LENGTH ? stripped : token;
    })
    .filter((token) => token.length >= MIN_TOKEN_LENGTH && !STOPWORDS.has(token));
  return [...new Set(tokens)];
}

export function parseKnowledgeEntries(value: unknown): readonly KnowledgeEntry[] {
  if (!Array.isArray(value)) {
    throw new Error("KNOWLEDGE_VALIDATION_ERROR knowledge file must be an array");
  }
  return value.map((raw, idx) => {
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      throw new Error(`KNOWLEDGE_VALIDATION_ERROR entry[${idx}] must be an object`);
    }
    const row = raw as Record<string, unknown>;
    if (typeof row.id !== "string" || typeof row.text !== "string" || row.text.trim() === "") {
      throw new Error(`KNOWLEDGE_VALIDATION_ERROR entry[${idx}] requires id and text`);
    }
    return { id: row.id, text: row.text };
  });
}

export function loadKnowledgeEntries(filePath: string = DEFAULT_KNOWLEDGE_PATH): readonly KnowledgeEntry[] {
  const serialized = fs.readFileSync(filePath, "utf8");
  return parseKnowledgeEntries(JSON.parse(serialized) as unknown);
}

/**
 * In-process retrieval: the score is the share of query tokens found in a snippet.
 */
export class KeywordRetriever implements RetrieverPort {
  private readonly entries: readonly KnowledgeEntry[];
  private readonly topK: number;

  constructor(entries: readonly KnowledgeEntry[], options: KeywordRetrieverOptions = {}) {
    this.entries = entries;
    this.topK = options.topK ?? DEFAULT_TOP_K;
  }

  async retrieve(query: string): Promise<readonly KnowledgeSnippet[]> {
    const tokens = tokenize(query);
    if (tokens.length === 0) {
      return [];
    }

    const scored = this.entries
      .map((entry, order) => {
        const haystack = entry.text.normalize("NFC").toLowerCase();
        const hits = tokens.filter((token) => haystack.includes(token)).length;
        return { text: entry.text, score: hits / tokens.length, order };
      })
      .filter((row) => row.score > 0);

    scored.sort((a, b) => b.score - a.score || a.order - b.order);
    return scored.slice(0, this.topK).map(({ text, score }) => ({ text, score }));
  }
}
