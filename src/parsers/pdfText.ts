import path from 'path';
import { PDFParse } from 'pdf-parse';
import type { ExtractedText, UploadedDocument } from '../types.js';
import {
  ExtractionFailedError,
  NoTextFoundError,
  UnsupportedFormatError,
  describeError,
} from '../errors.js';

export function isPdfFilename(filename: string): boolean {
  return path.extname(filename).toLowerCase() === '.pdf';
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Builds an upload from a browser file-picker payload. Accepts a data URL
 * (`data:application/pdf;base64,...`) or bare base64. A non-PDF filename is
 * rejected before the contents are looked at.
 */
export function decodeUpload(filename: string, contents: string): UploadedDocument {
  if (!isPdfFilename(filename)) {
    throw new UnsupportedFormatError(filename);
  }
  const comma = contents.indexOf(',');
  const isDataUrl = contents.startsWith('data:') && comma !== -1;
  if (isDataUrl && !contents.slice(0, comma).endsWith(';base64')) {
    throw new ExtractionFailedError('upload is not base64-encoded');
  }
  const body = (isDataUrl ? contents.slice(comma + 1) : contents).replace(/\s+/g, '');
  if (!body || !/^[A-Za-z0-9+/]+={0,2}$/.test(body)) {
    throw new ExtractionFailedError('upload is not valid base64');
  }
  return { filename, data: Buffer.from(body, 'base64') };
}

export async function extractPdfText(doc: UploadedDocument): Promise<ExtractedText> {
  if (!isPdfFilename(doc.filename)) {
    throw new UnsupportedFormatError(doc.filename);
  }

  const parser = new PDFParse({ data: doc.data });
  let raw: string;
  let pageCount: number;
  try {
    // pdf-parse separates pages with "-- n of m --" markers by default; read the pages instead
    const result = await parser.getText({ pageJoiner: '' });
    raw = result.pages.map((page) => page.text).join('\n');
    pageCount = result.total;
  } catch (err) {
    throw new ExtractionFailedError(describeError(err), err);
  } finally {
    await parser.destroy();
  }

  const text = normalizeWhitespace(raw);
  if (pageCount === 0 || !text) {
    throw new NoTextFoundError(doc.filename);
  }
  console.log(`[parse] ${doc.filename}: ${text.length} characters from ${pageCount} page${pageCount === 1 ? '' : 's'}`);
  return { text, pageCount };
}
