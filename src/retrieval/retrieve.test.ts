import { describe, expect, it } from "vitest";
import { RetrievalError } from "../errors.js";
import { HashingEmbedder, seedStore } from "../test-utils/index.js";
import { LocalVectorStore } from "./localStore.js";
import { Retriever } from "./retrieve.js";
import type { VectorMatch, VectorStore } from "./types.js";

const FAITH = "Faith is the assurance of things hoped for and the conviction of things not seen.";
const GRACE = "Grace is unearned favor that no one can buy or work for.";
const PRAYER = "Prayer is conversation with God in every season of life.";

async function setup() {
  const embedder = new HashingEmbedder();
  const store = await seedStore(embedder, [
    { url: "https://example.org/faith.html", title: "Walking By Faith", category: "Faith", chunks: [FAITH] },
    { url: "https://example.org/grace.html", title: "The Gift Of Grace", chunks: [GRACE] },
    { url: "https://example.org/prayer.html", title: "Praying Always", chunks: [PRAYER] },
  ]);
  return { embedder, store, retriever: new Retriever(store, { dimension: 384 }) };
}

describe("Retriever", () => {
  it("finds a chunk from its own text with a near-perfect score", async () => {
    const { embedder, retriever } = await setup();
    const results = await retriever.retrieve(await embedder.embed(FAITH), 1);
    expect(results).toHaveLength(1);
    expect(results[0].chunk.text).toBe(FAITH);
    expect(results[0].chunk.title).toBe("Walking By Faith");
    expect(results[0].chunk.category).toBe("Faith");
    expect(results[0].chunk.source).toBe("https://example.org/faith.html");
    expect(results[0].score).toBeGreaterThan(0.95);
  });

  it("returns exactly min(k, total) results, best first", async () => {
    const { embedder, retriever } = await setup();
    const query = await embedder.embed("what is grace");
    for (const k of [1, 2, 3, 5, 10]) {
      const results = await retriever.retrieve(query, k);
      expect(results).toHaveLength(Math.min(k, 3));
      const scores = results.map((r) => r.score);
      expect(scores).toEqual([...scores].sort((a, b) => b - a));
    }
  });

  it("rejects a query of the wrong dimension", async () => {
    const { retriever } = await setup();
    await expect(retriever.retrieve([1, 0, 0], 3)).rejects.toThrow(
      "Query vector has 3 components, index dimension is 384"
    );
  });

  it("rejects a non-positive k and other metrics", async () => {
    const { embedder, retriever } = await setup();
    const query = await embedder.embed("faith");
    await expect(retriever.retrieve(query, 0)).rejects.toThrow(RetrievalError);
    await expect(retriever.retrieve(query, 1.5)).rejects.toThrow(RetrievalError);
    await expect(retriever.retrieve(query, 3, "dotproduct")).rejects.toThrow(RetrievalError);
  });

  it("returns an empty list from an empty index", async () => {
    const retriever = new Retriever(new LocalVectorStore(), { dimension: 384 });
    expect(await retriever.retrieve(new Array<number>(384).fill(1), 3)).toEqual([]);
  });

  it("wraps store failures in RetrievalError", async () => {
    const broken: VectorStore = {
      upsert: async () => {},
      delete: async () => {},
      describe: async () => ({ dimension: 384, metric: "cosine", totalRecords: 0 }),
      query: async (): Promise<VectorMatch[]> => {
        throw new Error("connection refused");
      },
    };
    const retriever = new Retriever(broken, { dimension: 384 });
    const pending = retriever.retrieve(new Array<number>(384).fill(1), 3);
    await expect(pending).rejects.toThrow(RetrievalError);
    await expect(pending).rejects.toThrow("Vector store query failed");
  });

  it("skips matches without text", async () => {
    const store: VectorStore = {
      upsert: async () => {},
      delete: async () => {},
      describe: async () => ({ dimension: 2, metric: "cosine", totalRecords: 2 }),
      query: async () => [
        { id: "x", score: 0.9, metadata: { title: "No text" } },
        { id: "y", score: 0.8, metadata: { text: "Hope anchors the soul.", title: "Hope" } },
      ],
    };
    const results = await new Retriever(store, { dimension: 2 }).retrieve([1, 0], 2);
    expect(results.map((r) => r.chunk.id)).toEqual(["y"]);
    expect(results[0].chunk.category).toBe("General");
  });
});
