import axios from "axios";
import { z } from "zod";
import { PermanentError, dLog } from "@scanflow/shared";
import type { KnowledgeDocument, KnowledgeIndex } from "./types";

const hitSchema = z.object({
  _score: z.number().nullable().optional(),
  _source: z
    .object({
      title: z.string().optional(),
      content: z.string().optional(),
      source: z.string().optional(),
      author: z.string().optional(),
      publication_date: z.string().optional(),
      url: z.string().optional(),
      confidence: z.number().optional(),
    })
    .passthrough()
    .optional(),
});

const searchResponseSchema = z.object({
  hits: z.object({ hits: z.array(hitSchema) }).optional(),
});

export function buildSearchBody(query: string, topK: number) {
  return {
    size: topK,
    query: {
      bool: {
        should: [
          { match: { content: { query, boost: 1.0 } } },
          {
            multi_match: {
              query,
              fields: ["title^2", "content", "keywords^1.5"],
              type: "best_fields",
              tie_breaker: 0.3,
              boost: 1.5,
            },
          },
        ],
        minimum_should_match: 1,
      },
    },
    _source: ["title", "content", "source", "publication_date", "author", "url", "confidence"],
  };
}

/** Map raw hits to documents; scores are normalized to 0..1 (score / 10, capped) */
export function toKnowledgeDocuments(raw: unknown): KnowledgeDocument[] {
  const parsed = searchResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PermanentError(`Knowledge index returned an unexpected body: ${parsed.error.message}`, "validation");
  }
  return (parsed.data.hits?.hits ?? []).map((hit) => {
    const src = hit._source ?? {};
    return {
      title: src.title ?? "Unknown",
      content: src.content ?? "",
      source: src.source ?? "Unknown",
      author: src.author ?? "",
      publicationDate: src.publication_date ?? "",
      url: src.url ?? "",
      relevanceScore: Math.min((hit._score ?? 0) / 10, 1),
      confidence: src.confidence ?? 0.8,
    };
  });
}

/** OpenSearch-compatible `_search` over the medical knowledge index */
export class HttpKnowledgeIndex implements KnowledgeIndex {
  constructor(
    private readonly baseUrl: string,
    private readonly indexName: string,
    private readonly timeoutMs: number
  ) {}

  async search(query: string, topK: number): Promise<KnowledgeDocument[]> {
    if (!this.baseUrl) {
      throw new PermanentError("KNOWLEDGE_INDEX_URL is not configured", "validation");
    }
    const url = `${this.baseUrl.replace(/\/+$/, "")}/${encodeURIComponent(this.indexName)}/_search`;
    const started = Date.now();
    const response = await axios.post<unknown>(url, buildSearchBody(query, topK), {
      headers: { "Content-Type": "application/json" },
      timeout: this.timeoutMs,
    });
    const docs = toKnowledgeDocuments(response.data);
    dLog(`[knowledge] ${docs.length} documents in ${((Date.now() - started) / 1000).toFixed(2)}s`);
    return docs;
  }
}
