import mammoth from 'mammoth';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ValidationError } from '../lib/errors.js';
import { validateUpload } from './file-validator.js';
import type { DocumentKind, UploadedDocument } from './file-validator.js';

/** Documents with less readable text than this are rejected. */
const MIN_TEXT_CHARS = 20;

async function extractPdfText(bytes: Uint8Array): Promise<string> {
  // pdf.js takes ownership of the buffer it is given.
  const pdf = await getDocument({ data: new Uint8Array(bytes), useSystemFonts: true }).promise;
  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      const line = content.items
        .map((item) => ('str' in item ? item.str : ''))
        .join(' ');
      pages.push(line);
    }
    return pages.join('\n');
  } finally {
    await pdf.destroy();
  }
}

async function extractDocxText(bytes: Uint8Array): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
  return result.value;
}

export async function extractTextByKind(kind: DocumentKind, bytes: Uint8Array): Promise<string> {
  switch (kind) {
    case 'pdf':
      return extractPdfText(bytes);
    case 'docx':
      return extractDocxText(bytes);
    case 'txt':
      return new TextDecoder('utf-8').decode(bytes);
  }
}

/**
 * Validate an upload and return its plain text, whitespace-normalised.
 * Throws ValidationError when the document is unreadable or empty.
 */
export async function extractText(upload: UploadedDocument, maxBytes?: number): Promise<string> {
  const kind = validateUpload(upload, maxBytes);
  let raw: string;
  try {
    raw = await extractTextByKind(kind, upload.bytes);
  } catch (err) {
    throw new ValidationError(`Could not read ${upload.filename}`, {
      filename: upload.filename,
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const text = raw
    .replace(/\r\n/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
  if (text.length < MIN_TEXT_CHARS) {
    throw new ValidationError('No readable text found in the document', { filename: upload.filename });
  }
  return text;
}
