import { detectDocumentKind, extractTextFromBuffer, normalizeText, stripCodeFence, truncateForPrompt } from './textNormalizer';

describe('textNormalizer', () => {
  it('normalizes line endings, tabs, spaces and blank lines', () => {
    expect(normalizeText('  a\r\nb\tc   d\n\n\n\ne  ')).toBe('a\nb c d\n\ne');
  });

  it('truncates to a plain character prefix', () => {
    expect(truncateForPrompt('abcdef', 3)).toBe('abc');
    expect(truncateForPrompt('abc', 3)).toBe('abc');
    expect(truncateForPrompt('abc', 0)).toBe('');
  });

  it('strips a json code fence', () => {
    expect(stripCodeFence('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripCodeFence('{"a":1}')).toBe('{"a":1}');
  });

  it('detects document kinds from extension or mime type', () => {
    expect(detectDocumentKind('IEP.PDF')).toBe('pdf');
    expect(detectDocumentKind('upload', 'application/pdf')).toBe('pdf');
    expect(detectDocumentKind('eval.docx')).toBe('docx');
    expect(detectDocumentKind('notes.md')).toBe('text');
    expect(detectDocumentKind('scan.png', 'image/png')).toBeNull();
  });

  it('decodes text files', async () => {
    await expect(extractTextFromBuffer(Buffer.from('Line one\r\n\r\n\r\nLine two'), 'notes.txt')).resolves.toBe('Line one\n\nLine two');
  });

  it('rejects unsupported files', async () => {
    await expect(extractTextFromBuffer(Buffer.from([0x89, 0x50]), 'scan.png', 'image/png')).rejects.toThrow(
      'Unsupported file type: .png (scan.png)',
    );
  });
});
