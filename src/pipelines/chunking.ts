import { ChunkStrategy } from "../domain/types.js";

export const DEFAULT_CHUNK_SIZE = 512;
export const DEFAULT_CHUNK_OVERLAP = 64;

const SMART_PARAGRAPH_THRESHOLD = 3;
const SMART_SENTENCE_THRESHOLD = 5;

const CJK_TERMINATORS = new Set(["\u3002", "\uFF01", "\uFF1F"]);
const LATIN_TERMINATORS = new Set([".", "!", "?"]);
const PARAGRAPH_BREAK = /\n[^\S\n]*\n\s*/;
const ENDS_WITH_CJK = /[\u3000-\u9FFF\uFF00-\uFFEF]$/;

export type ConcreteStrategy = Exclude<ChunkStrategy, "smart">;

export interface ChunkOptions {
  strategy: ChunkStrategy;
  size?: number;
  overlap?: number;
}

interface Piece {
  text: string;
  forced: boolean;
}

export function splitIntoChunks(text: string, options: ChunkOptions): string[] {
  const size = Math.max(1, Math.floor(options.size ?? DEFAULT_CHUNK_SIZE));
  const overlap = clampOverlap(size, options.overlap ?? DEFAULT_CHUNK_OVERLAP);

  if (!text.trim()) {
    return [];
  }

  const strategy = options.strategy === "smart" ? selectSmartStrategy(text) : options.strategy;
  switch (strategy) {
    case "fixed":
      return splitFixed(text, size, overlap);
    case "paragraph":
      return splitByParagraph(text, size, overlap);
    case "sentence":
      return splitBySentence(text, size, overlap);
  }
}

/** Pure function of the paragraph and sentence counts. */
export function selectSmartStrategy(text: string): ConcreteStrategy {
  if (splitParagraphs(text).length >= SMART_PARAGRAPH_THRESHOLD) {
    return "paragraph";
  }
  if (splitSentences(text).length >= SMART_SENTENCE_THRESHOLD) {
    return "sentence";
  }
  return "fixed";
}

/**
 * Sliding window of `size` characters advancing by `size - overlap`. The text is not
 * trimmed, so dropping the first `overlap` characters of every chunk after the first and
 * concatenating gives back the input.
 */
export function splitFixed(text: string, size: number, overlap: number): string[] {
  if (!text.trim()) {
    return [];
  }
  if (text.length <= size) {
    return [text];
  }

  const step = size - clampOverlap(size, overlap);
  const chunks: string[] = [];
  for (let start = 0; start < text.length; start += step) {
    const end = Math.min(start + size, text.length);
    const piece = text.slice(start, end);
    if (piece.trim()) {
      chunks.push(piece);
    }
    if (end >= text.length) {
      break;
    }
  }
  return chunks;
}

export function splitByParagraph(text: string, size: number, overlap: number): string[] {
  const chunks: string[] = [];
  let buffer = "";

  const flush = () => {
    if (buffer) {
      chunks.push(buffer);
      buffer = "";
    }
  };

  for (const paragraph of splitParagraphs(text)) {
    if (paragraph.length > size) {
      flush();
      chunks.push(...splitFixed(paragraph, size, overlap));
      continue;
    }

    if (!buffer) {
      buffer = paragraph;
    } else if (buffer.length + 2 + paragraph.length <= size) {
      buffer = `${buffer}\n\n${paragraph}`;
    } else {
      flush();
      buffer = paragraph;
    }
  }

  flush();
  return chunks;
}

export function splitBySentence(text: string, size: number, overlap: number): string[] {
  const pieces: Piece[] = [];
  let buffer = "";

  const flush = () => {
    const trimmed = buffer.trim();
    if (trimmed) {
      pieces.push({ text: trimmed, forced: false });
    }
    buffer = "";
  };

  for (const sentence of splitSentences(text)) {
    const trimmed = sentence.trim();
    if (trimmed.length > size) {
      flush();
      for (const part of splitFixed(trimmed, size, overlap)) {
        pieces.push({ text: part, forced: true });
      }
      continue;
    }

    if ((buffer + sentence).trim().length <= size) {
      buffer += sentence;
    } else {
      flush();
      buffer = sentence;
    }
  }
  flush();

  return applyTrailingOverlap(pieces, overlap);
}

export function splitParagraphs(text: string): string[] {
  return text
    .replace(/\r\n/g, "\n")
    .split(PARAGRAPH_BREAK)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean);
}

/** Each sentence keeps its terminator and the whitespace that follows it. */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let start = 0;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    const cjk = CJK_TERMINATORS.has(ch);
    const latin = LATIN_TERMINATORS.has(ch) && (i + 1 >= text.length || /\s/.test(text[i + 1]));
    if (!cjk && !latin) {
      continue;
    }

    let end = i + 1;
    while (cjk && end < text.length && CJK_TERMINATORS.has(text[end])) {
      end += 1;
    }
    while (end < text.length && /\s/.test(text[end])) {
      end += 1;
    }

    sentences.push(text.slice(start, end));
    start = end;
    i = end - 1;
  }

  if (start < text.length) {
    sentences.push(text.slice(start));
  }
  return sentences.filter((sentence) => sentence.trim());
}

function applyTrailingOverlap(pieces: Piece[], overlap: number): string[] {
  if (overlap <= 0) {
    return pieces.map((piece) => piece.text);
  }

  return pieces.map((piece, index) => {
    const next = pieces[index + 1];
    if (!next || piece.forced || next.forced) {
      return piece.text;
    }
    const lead = next.text.slice(0, overlap);
    const separator = ENDS_WITH_CJK.test(piece.text) ? "" : " ";
    return `${piece.text}${separator}${lead}`;
  });
}

function clampOverlap(size: number, overlap: number): number {
  return Math.min(Math.max(Math.floor(overlap), 0), size - 1);
}
