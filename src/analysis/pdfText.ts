import { PDFParse } from "pdf-parse";

interface TextParserLike {
  getText(): Promise<{ text: string }>;
  destroy(): Promise<void>;
}

export type TextExtractor = (bytes: Buffer) => Promise<string>;

export const TRUNCATION_MARKER = "[CONTENT TRUNCATED DUE TO LENGTH]";

export function createPdfTextExtractor(
  parserFactory: (data: Buffer) => TextParserLike = (data) => new PDFParse({ data }),
): TextExtractor {
  return async (bytes) => {
    const parser = parserFactory(bytes);
    try {
      const result = await parser.getText();
      return result.text.trim();
    } finally {
      await parser.destroy();
    }
  };
}

export function truncateContent(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }
  return { text: `${text.slice(0, maxChars)}\n\n${TRUNCATION_MARKER}`, truncated: true };
}
