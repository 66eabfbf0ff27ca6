import { ValidationError } from '../lib/errors.js';

export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export type DocumentKind = 'pdf' | 'docx' | 'txt';

export interface UploadedDocument {
  filename: string;
  bytes: Uint8Array;
}

const EXTENSIONS: Record<string, DocumentKind> = {
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.txt': 'txt',
};

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46]; // %PDF
const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04]; // PK\x03\x04 (docx is a zip container)

function startsWith(bytes: Uint8Array, magic: readonly number[]): boolean {
  return magic.every((byte, i) => bytes[i] === byte);
}

export function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot >= 0 ? filename.slice(dot).toLowerCase() : '';
}

/** Checks size, extension and magic bytes. Returns the detected kind. */
export function validateUpload(
  upload: UploadedDocument,
  maxBytes: number = DEFAULT_MAX_UPLOAD_BYTES,
): DocumentKind {
  if (upload.bytes.byteLength === 0) {
    throw new ValidationError('Uploaded file is empty', { filename: upload.filename });
  }
  if (upload.bytes.byteLength > maxBytes) {
    throw new ValidationError(`File too large (max ${Math.round(maxBytes / 1024 / 1024)}MB)`, {
      filename: upload.filename,
      size: upload.bytes.byteLength,
      max_bytes: maxBytes,
    });
  }

  const extension = extensionOf(upload.filename);
  const kind = EXTENSIONS[extension];
  if (!kind) {
    throw new ValidationError(`Unsupported file type "${extension || 'none'}". Allowed: ${Object.keys(EXTENSIONS).join(', ')}`, {
      filename: upload.filename,
    });
  }

  if (kind === 'pdf' && !startsWith(upload.bytes, PDF_MAGIC)) {
    throw new ValidationError('File content does not match a PDF document', { filename: upload.filename });
  }
  if (kind === 'docx' && !startsWith(upload.bytes, ZIP_MAGIC)) {
    throw new ValidationError('File content does not match a DOCX document', { filename: upload.filename });
  }
  return kind;
}
