import { describe, expect, it } from "vitest";
import { chunkId, chunkWords, documentId } from "./chunk.js";

function words(n: number): string {
  return Array.from({ length: n }, (_, i) => `w${i}`).join(" ");
}

describe("chunkWords", () => {
  it("returns one chunk for short text", () => {
    expect(chunkWords("faith hope love")).toEqual(["faith hope love"]);
  });

  it("returns nothing for blank text", () => {
    expect(chunkWords("   \n ")).toEqual([]);
  });

  it("overlaps consecutive windows", () => {
    const chunks = chunkWords(words(10), { chunkSize: 4, overlap: 1 });
    expect(chunks).toEqual(["w0 w1 w2 w3", "w3 w4 w5 w6", "w6 w7 w8 w9", "w9"]);
  });

  it("uses 500-word windows with a 50-word overlap by default", () => {
    const chunks = chunkWords(words(1000));
    expect(chunks).toHaveLength(3);
    expect(chunks[0].split(" ")).toHaveLength(500);
    expect(chunks[1].split(" ")[0]).toBe("w450");
    expect(chunks[2].split(" ")[0]).toBe("w900");
    expect(chunks[2].split(" ")).toHaveLength(100);
  });
});

describe("ids", () => {
  it("derives a stable id from the source and position", () => {
    const id = documentId("https://example.org/faith.html");
    expect(id).toMatch(/^[0-9a-f]{32}$/);
    expect(documentId("https://example.org/faith.html")).toBe(id);
    expect(chunkId(id, 2)).toBe(`${id}_chunk_2`);
  });
});
