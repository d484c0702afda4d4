import path from 'path';
import mammoth from 'mammoth';

export type DocumentKind = 'pdf' | 'docx' | 'text';

export function normalizeText(s: string): string {
    return s
      .replace(/\r\n/g, "\n")
      .replace(/\t/g, "  ")
      .replace(/[ \u00A0]+/g, " ")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
  }

export function detectDocumentKind(fileName: string, mimeType?: string): DocumentKind | null {
    const ext = path.extname(fileName).toLowerCase();
    if (ext === '.pdf' || mimeType === 'application/pdf') return 'pdf';
    if (ext === '.docx' || mimeType === 'application/vnd.openxmlformats-officedocument.wordprocessingml.document') return 'docx';
    if (ext === '.txt' || ext === '.md' || mimeType?.startsWith('text/')) return 'text';
    return null;
}

export async function extractTextFromBuffer(buffer: Buffer, fileName: string, mimeType?: string): Promise<string> {
    const kind = detectDocumentKind(fileName, mimeType);

    if (kind === 'pdf') {
        // pdf-parse drags in pdfjs; load it only when a PDF actually arrives
        const { PDFParse } = await import('pdf-parse');
        const parser = new PDFParse({ data: new Uint8Array(buffer) });
        try {
            const result = await parser.getText();
            return normalizeText(result.text || "");
        } finally {
            await parser.destroy();
        }
    }

    if (kind === 'docx') {
        const res = await mammoth.extractRawText({ buffer });
        return normalizeText(res.value || "");
    }

    if (kind === 'text') {
        return normalizeText(buffer.toString('utf8'));
    }

    throw new Error(`Unsupported file type: ${path.extname(fileName) || mimeType || 'unknown'} (${fileName})`);
}

/** Plain character prefix; no attempt to respect tokens or sentences. */
export function truncateForPrompt(text: string, maxChars: number): string {
    if (maxChars <= 0) return '';
    return text.length <= maxChars ? text : text.slice(0, maxChars);
}

// Models like to wrap JSON in ```json ... ``` even when told not to.
export function stripCodeFence(s: string): string {
    return s.trim().replace(/^```(?:json)?\s*|\s*```$/g, '');
}
