import type { KnowledgeDocument } from "../types";
import {
  buildReportPrompt,
  extractConfidenceScores,
  extractSourceReferences,
  formatKnowledgeContext,
} from "../reportPrompt";
import { buildSearchBody, toKnowledgeDocuments } from "../knowledgeIndex";

const doc = (title: string, relevanceScore: number, extra: Partial<KnowledgeDocument> = {}): KnowledgeDocument => ({
  title,
  content: `${title} content`,
  source: "Test Journal",
  author: "",
  publicationDate: "",
  url: "",
  relevanceScore,
  confidence: 0.8,
  ...extra,
});

describe("extractConfidenceScores", () => {
  it("maps the first cue found to a score", () => {
    expect(extractConfidenceScores("Finding A (High Confidence).")).toEqual({
      overall: 0.9,
      findings: 0.9,
      diagnosis: 0.8,
    });
    expect(extractConfidenceScores("medium confidence overall")).toEqual({
      overall: 0.7,
      findings: 0.7,
      diagnosis: 0.6,
    });
    expect(extractConfidenceScores("only low confidence here")).toEqual({
      overall: 0.5,
      findings: 0.5,
      diagnosis: 0.4,
    });
  });

  it("prefers high over lower cues and defaults to 0.8", () => {
    expect(extractConfidenceScores("low confidence for B, high confidence for A").overall).toBe(0.9);
    expect(extractConfidenceScores("No cues at all.")).toEqual({ overall: 0.8, findings: 0.8, diagnosis: 0.7 });
  });
});

describe("extractSourceReferences", () => {
  const docs = [doc("Alpha study", 0.9), doc("Beta review", 0.5), doc("Alpha study", 0.3)];

  it("keeps documents whose title the report cites, once each", () => {
    const refs = extractSourceReferences("As shown in Alpha study and Beta review.", docs);
    expect(refs.map((r) => [r.title, r.relevanceScore, r.inferred])).toEqual([
      ["Alpha study", 0.9, undefined],
      ["Beta review", 0.5, undefined],
    ]);
  });

  it("falls back to the top document marked as inferred", () => {
    expect(extractSourceReferences("No citations.", docs)).toEqual([
      {
        title: "Alpha study",
        source: "Test Journal",
        author: "",
        publicationDate: "",
        url: "",
        relevanceScore: 0.9,
        inferred: true,
      },
    ]);
  });

  it("returns nothing without documents", () => {
    expect(extractSourceReferences("Anything.", [])).toEqual([]);
  });
});

describe("report prompt", () => {
  it("lists documents with their metadata", () => {
    const context = formatKnowledgeContext([
      doc("Alpha study", 0.456, { author: "B. Writer", publicationDate: "2020" }),
    ]);
    expect(context).toBe(
      "[Document 1]\nTitle: Alpha study\nSource: Test Journal by B. Writer (2020)\nRelevance Score: 0.46\nContent: Alpha study content\n"
    );
  });

  it("says so when no knowledge was found", () => {
    expect(formatKnowledgeContext([])).toBe("No relevant medical knowledge found.");
    expect(buildReportPrompt("A lesion.", [])).toContain(
      "## MRI Image Description:\nA lesion.\n\n## Relevant Medical Knowledge:\nNo relevant medical knowledge found."
    );
  });
});

describe("knowledge index mapping", () => {
  it("normalizes scores and fills missing fields", () => {
    const docs = toKnowledgeDocuments({
      hits: {
        hits: [
          { _score: 5, _source: { title: "Alpha study", content: "text", url: "https://example.org/a" } },
          { _score: 25, _source: { confidence: 0.95 } },
          { _score: null },
        ],
      },
    });
    expect(docs).toEqual([
      {
        title: "Alpha study",
        content: "text",
        source: "Unknown",
        author: "",
        publicationDate: "",
        url: "https://example.org/a",
        relevanceScore: 0.5,
        confidence: 0.8,
      },
      {
        title: "Unknown",
        content: "",
        source: "Unknown",
        author: "",
        publicationDate: "",
        url: "",
        relevanceScore: 1,
        confidence: 0.95,
      },
      {
        title: "Unknown",
        content: "",
        source: "Unknown",
        author: "",
        publicationDate: "",
        url: "",
        relevanceScore: 0,
        confidence: 0.8,
      },
    ]);
  });

  it("treats a body without hits as no documents", () => {
    expect(toKnowledgeDocuments({})).toEqual([]);
  });

  it("rejects bodies of the wrong shape", () => {
    expect(() => toKnowledgeDocuments({ hits: { hits: "nope" } })).toThrow(/^Knowledge index returned an unexpected body/);
  });

  it("asks for top-k hits across title and content", () => {
    const body = buildSearchBody("frontal lesion", 4);
    expect(body).toMatchObject({
      size: 4,
      query: {
        bool: {
          should: [
            { match: { content: { query: "frontal lesion" } } },
            { multi_match: { query: "frontal lesion", fields: ["title^2", "content", "keywords^1.5"] } },
          ],
          minimum_should_match: 1,
        },
      },
    });
  });
});
