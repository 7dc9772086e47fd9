/**
 * Page text extraction.
 * The default extractor reads born-digital PDFs through unpdf (pdf.js);
 * tests and other callers can plug in any PageExtractor.
 */

import fs from "node:fs/promises";
import { getDocumentProxy } from "unpdf";
import { ErrorCode, ExtractionError, FileSystemError, errorMessage, isErrnoException } from "../utils/errors.js";
import { normalizeText } from "../utils/text.js";

/**
 * Yields normalized text per page, in page order (index 0 is page 1)
 */
export interface PageExtractor {
  extractPages(filePath: string): Promise<string[]>;
}

/**
 * The part of a pdf.js document the extractor reads
 */
export interface PdfDocumentHandle {
  numPages: number;
  getPage(pageNumber: number): Promise<{ getTextContent(): Promise<{ items: readonly unknown[] }> }>;
  destroy(): Promise<void>;
}

export type PdfOpener = (data: Uint8Array) => Promise<PdfDocumentHandle>;

/** Text runs carry `str`; marked-content items have none */
function itemText(item: unknown): string {
  if (typeof item === "object" && item !== null && "str" in item && typeof item.str === "string") {
    return item.str;
  }
  return "";
}

export class UnpdfPageExtractor implements PageExtractor {
  private readonly open: PdfOpener;

  constructor(open: PdfOpener = getDocumentProxy) {
    this.open = open;
  }

  async extractPages(filePath: string): Promise<string[]> {
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (err) {
      if (isErrnoException(err)) {
        throw FileSystemError.fromNodeError(err, filePath, "read");
      }
      throw err;
    }

    let pdf: PdfDocumentHandle;
    try {
      pdf = await this.open(new Uint8Array(buffer));
    } catch (err) {
      throw new ExtractionError(ErrorCode.EXTRACTION_FAILED, `Cannot open PDF: ${errorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
        filePath,
      });
    }

    try {
      const pages: string[] = [];
      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        const textContent = await page.getTextContent();
        pages.push(normalizeText(textContent.items.map(itemText).join(" ")));
      }
      return pages;
    } catch (err) {
      throw new ExtractionError(ErrorCode.EXTRACTION_UNSUPPORTED, `Cannot read PDF text: ${errorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
        filePath,
      });
    } finally {
      await pdf.destroy();
    }
  }
}
