import { describe, it, expect } from "vitest";
import { PDFDocument } from "pdf-lib";
import {
  estimatePagesPerChunk,
  splitDocument,
  splitPdf,
  type PaginatedDocument,
} from "../../src/extraction/pdf-splitter.js";

const MIB = 1024 * 1024;

/** Pages of fixed byte sizes; a range serializes to the sum of its pages. */
function sizedDocument(pageSizes: number[], byteLength?: number): PaginatedDocument {
  const total = pageSizes.reduce((a, b) => a + b, 0);
  return {
    pageCount: pageSizes.length,
    byteLength: byteLength ?? total,
    async serialize(start, end) {
      const size = pageSizes.slice(start, end).reduce((a, b) => a + b, 0);
      return new Uint8Array(size);
    },
  };
}

function coveredPages(chunks: Array<{ startPage: number; endPage: number }>): number[] {
  return chunks.flatMap((c) => Array.from({ length: c.endPage - c.startPage }, (_, i) => c.startPage + i));
}

describe("estimatePagesPerChunk", () => {
  it("scales pages by the size ratio", () => {
    expect(estimatePagesPerChunk(40, 30 * MIB, 25 * MIB)).toBe(33);
  });

  it("falls back to one page for an empty byte count", () => {
    expect(estimatePagesPerChunk(10, 0, 25 * MIB)).toBe(1);
  });
});

describe("splitDocument", () => {
  it("splits a 40-page 30MB document into two chunks under 25MB", async () => {
    const doc = sizedDocument(Array.from({ length: 40 }, () => (30 * MIB) / 40));
    const chunks = await splitDocument(doc, 25 * MIB);

    expect(chunks.map((c) => [c.index, c.startPage, c.endPage])).toEqual([
      [0, 0, 33],
      [1, 33, 40],
    ]);
    for (const c of chunks) expect(c.bytes.byteLength).toBeLessThanOrEqual(25 * MIB);
    expect(coveredPages(chunks)).toEqual(Array.from({ length: 40 }, (_, i) => i));
  });

  it("binary-searches down when the estimate overshoots", async () => {
    // Claimed size is smaller than the pages serialize to, as with shared resources.
    const doc = sizedDocument(Array.from({ length: 8 }, () => 10), 40);
    const chunks = await splitDocument(doc, 25);

    expect(chunks.map((c) => [c.startPage, c.endPage, c.bytes.byteLength])).toEqual([
      [0, 2, 20],
      [2, 4, 20],
      [4, 6, 20],
      [6, 8, 20],
    ]);
  });

  it("emits an oversized page as its own chunk", async () => {
    const chunks = await splitDocument(sizedDocument([5, 40, 5]), 20);
    expect(chunks.map((c) => [c.startPage, c.endPage, c.bytes.byteLength])).toEqual([
      [0, 1, 5],
      [1, 2, 40],
      [2, 3, 5],
    ]);
  });

  it("covers every page once and respects the bound across varied layouts", async () => {
    let seed = 7;
    const next = () => {
      seed = (seed * 16807) % 2147483647;
      return seed / 2147483647;
    };

    for (let round = 0; round < 20; round++) {
      const pages = Array.from({ length: 1 + Math.floor(next() * 30) }, () => 1 + Math.floor(next() * 50));
      const bound = 20 + Math.floor(next() * 100);
      const claimed = Math.max(1, Math.floor(pages.reduce((a, b) => a + b, 0) * (0.3 + next())));
      const chunks = await splitDocument(sizedDocument(pages, claimed), bound);

      expect(coveredPages(chunks)).toEqual(pages.map((_, i) => i));
      for (const c of chunks) {
        if (c.endPage - c.startPage > 1) expect(c.bytes.byteLength).toBeLessThanOrEqual(bound);
      }
    }
  });

  it("returns one empty chunk for a document with no pages", async () => {
    const chunks = await splitDocument(sizedDocument([]), 100);
    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({ index: 0, startPage: 0, endPage: 0 });
  });
});

describe("splitPdf", () => {
  async function makePdf(pages: number): Promise<Uint8Array> {
    const pdf = await PDFDocument.create();
    for (let i = 0; i < pages; i++) pdf.addPage([612, 792]);
    return pdf.save();
  }

  it("keeps a small PDF in one chunk", async () => {
    const chunks = await splitPdf(await makePdf(6), 25 * MIB);
    expect(chunks).toHaveLength(1);
    const reloaded = await PDFDocument.load(chunks[0]?.bytes ?? new Uint8Array());
    expect(reloaded.getPageCount()).toBe(6);
  });

  it("falls back to single-page chunks when every page exceeds the bound", async () => {
    const chunks = await splitPdf(await makePdf(3), 1);
    expect(chunks.map((c) => [c.startPage, c.endPage])).toEqual([
      [0, 1],
      [1, 2],
      [2, 3],
    ]);
    for (const chunk of chunks) {
      const reloaded = await PDFDocument.load(chunk.bytes);
      expect(reloaded.getPageCount()).toBe(1);
    }
  });
});
