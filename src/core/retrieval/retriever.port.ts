import type { KnowledgeSnippet } from "../turn/turn.types";

/**
 * Knowledge lookup for one turn. A miss is an empty list, never an error.
 */
export interface RetrieverPort {
  retrieve(query: string): Promise<readonly KnowledgeSnippet[]>;
}
