import { PDFDocument } from "pdf-lib";
import { logger } from "./logger.js";
import type { DocumentChunk } from "./types.js";

/**
 * Anything that can re-serialize a page range of itself. The PDF
 * implementation is below; tests use sized fakes.
 */
export interface PaginatedDocument {
  readonly pageCount: number;
  readonly byteLength: number;
  /** Serializes pages [start, end) as a standalone document. */
  serialize(start: number, end: number): Promise<Uint8Array>;
}

export class PdfLibDocument implements PaginatedDocument {
  private constructor(
    private readonly source: PDFDocument,
    readonly byteLength: number,
  ) {}

  static async load(bytes: Uint8Array): Promise<PdfLibDocument> {
    const source = await PDFDocument.load(bytes, { ignoreEncryption: true, updateMetadata: false });
    return new PdfLibDocument(source, bytes.byteLength);
  }

  get pageCount(): number {
    return this.source.getPageCount();
  }

  async serialize(start: number, end: number): Promise<Uint8Array> {
    const out = await PDFDocument.create();
    const indices = Array.from({ length: Math.max(0, end - start) }, (_, i) => start + i);
    const copied = await out.copyPages(this.source, indices);
    copied.forEach((page) => out.addPage(page));
    return out.save();
  }
}

export function estimatePagesPerChunk(
  pageCount: number,
  byteLength: number,
  maxChunkBytes: number,
): number {
  if (byteLength <= 0) return 1;
  return Math.max(1, Math.floor((pageCount * maxChunkBytes) / byteLength));
}

/**
 * Splits a document into page-aligned chunks whose serialized size stays
 * within `maxChunkBytes`. A single page larger than the bound becomes its own
 * chunk. Every page lands in exactly one chunk, in order.
 */
export async function splitDocument(
  doc: PaginatedDocument,
  maxChunkBytes: number,
): Promise<DocumentChunk[]> {
  const total = doc.pageCount;
  if (total === 0) {
    return [{ index: 0, startPage: 0, endPage: 0, bytes: await doc.serialize(0, 0) }];
  }

  const perChunk = estimatePagesPerChunk(total, doc.byteLength, maxChunkBytes);
  logger.info("Splitting document", {
    pages: total,
    bytes: doc.byteLength,
    maxChunkBytes,
    estimatedPagesPerChunk: perChunk,
  });

  const chunks: DocumentChunk[] = [];
  let start = 0;

  while (start < total) {
    let end = Math.min(start + perChunk, total);
    let bytes = await doc.serialize(start, end);

    if (bytes.byteLength > maxChunkBytes && end - start > 1) {
      // Largest page count that still fits; falls back to a single page.
      let low = 1;
      let high = end - start - 1;
      let best = 1;
      let bestBytes: Uint8Array | null = null;

      while (low <= high) {
        const mid = Math.floor((low + high) / 2);
        const candidate = await doc.serialize(start, start + mid);
        if (candidate.byteLength <= maxChunkBytes) {
          best = mid;
          bestBytes = candidate;
          low = mid + 1;
        } else {
          high = mid - 1;
        }
      }

      end = start + best;
      bytes = bestBytes ?? (await doc.serialize(start, end));
    }

    chunks.push({ index: chunks.length, startPage: start, endPage: end, bytes });
    logger.info("Created chunk", {
      chunk: chunks.length,
      pages: `${start + 1}-${end}`,
      bytes: bytes.byteLength,
    });
    start = end;
  }

  logger.info("Split complete", { chunks: chunks.length });
  return chunks;
}

export async function splitPdf(bytes: Uint8Array, maxChunkBytes: number): Promise<DocumentChunk[]> {
  const doc = await PdfLibDocument.load(bytes);
  return splitDocument(doc, maxChunkBytes);
}
