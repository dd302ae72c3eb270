import { getDocumentProxy } from "unpdf";
import { describeError } from "./errors.js";
import { logger } from "./logger.js";
import type { DocumentChunk } from "./types.js";

export const NO_TEXT_SENTINEL = "[No extractable text found in PDF.]";

export interface PageTextSource {
  readonly numPages: number;
  /** 1-based page number within the source. */
  pageText(pageNumber: number): Promise<string>;
}

export function pageMarker(pageNumber: number): string {
  return `\n--- Page ${pageNumber} ---\n`;
}

/**
 * Joins per-page text behind page markers. A page that throws contributes
 * nothing; the rest of the chunk is still returned.
 */
export async function joinPageTexts(source: PageTextSource, firstPageNumber = 1): Promise<string> {
  const parts: string[] = [];

  for (let i = 1; i <= source.numPages; i++) {
    const pageNumber = firstPageNumber + i - 1;
    let text = "";
    try {
      text = await source.pageText(i);
    } catch (err) {
      logger.warn("Failed to extract page text", { page: pageNumber, error: describeError(err) });
    }
    if (text) parts.push(pageMarker(pageNumber) + text);
  }

  const joined = parts.join("").trim();
  const result = joined || NO_TEXT_SENTINEL;
  logger.info("Extracted text", { pages: source.numPages, chars: result.length });
  return result;
}

export async function openPdfText(bytes: Uint8Array): Promise<PageTextSource & { destroy(): Promise<void> }> {
  // pdfjs may detach the buffer it is handed; give it a copy.
  const pdf = await getDocumentProxy(new Uint8Array(bytes));
  return {
    numPages: pdf.numPages,
    async pageText(pageNumber) {
      const page = await pdf.getPage(pageNumber);
      const textContent = await page.getTextContent();
      return textContent.items
        .map((item) => ("str" in item ? item.str : ""))
        .join(" ");
    },
    destroy: () => pdf.destroy(),
  };
}

/** Text of one chunk, pages numbered as in the source document. */
export async function extractChunkText(chunk: DocumentChunk): Promise<string> {
  const source = await openPdfText(chunk.bytes);
  try {
    return await joinPageTexts(source, chunk.startPage + 1);
  } finally {
    await source.destroy();
  }
}
