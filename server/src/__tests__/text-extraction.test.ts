import { describe, it, expect } from 'vitest';
import { ValidationError } from '../lib/errors.js';
import { extractText } from '../documents/text-extraction.js';

const encode = (text: string) => new TextEncoder().encode(text);

describe('extractText', () => {
  it('normalises whitespace in plain-text uploads', async () => {
    const text = await extractText({
      filename: 'resume.txt',
      bytes: encode('Senior engineer\r\n\r\n\r\n\r\nSkills:\t Python,   SQL   '),
    });
    expect(text).toBe('Senior engineer\n\nSkills: Python, SQL');
  });

  it('rejects a document with too little text', async () => {
    await expect(extractText({ filename: 'resume.txt', bytes: encode('  hi  ') })).rejects.toThrow(
      'No readable text found in the document',
    );
  });

  it('wraps parser failures in a validation error', async () => {
    const error: unknown = await extractText({ filename: 'resume.docx', bytes: encode('PK\u0003\u0004 not a zip') }).catch(
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ message: 'Could not read resume.docx', status: 400 });
  });
});
