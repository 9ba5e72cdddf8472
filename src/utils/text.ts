const UNSEGMENTED_RUN = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Thai}]+/u;
const BASIC_TOKEN_REGEX =
  /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Thai}]+|(?:(?![\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Thai}])[\p{L}\p{N}])+/gu;

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

export function questionPrefix(question: string, length = 40): string {
  const flat = question.replace(/\s+/g, " ").trim();
  return flat.length > length ? `${flat.slice(0, length)}...` : flat;
}

export type TokenizerCapability = "segmenter" | "basic";

export interface Tokenizer {
  readonly capability: TokenizerCapability;
  tokenize(text: string): string[];
}

/**
 * Resolved once at startup. `auto` picks the ICU word segmenter when the runtime ships it,
 * otherwise the regex tokenizer that splits unsegmented scripts into character bigrams.
 */
export function resolveTokenizerCapability(
  preference: "auto" | TokenizerCapability,
): TokenizerCapability {
  if (preference === "basic") {
    return "basic";
  }
  const available = typeof Intl.Segmenter === "function";
  if (preference === "segmenter" && !available) {
    throw new Error("Intl.Segmenter is not available in this runtime.");
  }
  return available ? "segmenter" : "basic";
}

export function createTokenizer(capability: TokenizerCapability): Tokenizer {
  return capability === "segmenter" ? new SegmenterTokenizer() : new BasicTokenizer();
}

class SegmenterTokenizer implements Tokenizer {
  readonly capability = "segmenter" as const;

  private readonly segmenter = new Intl.Segmenter(undefined, { granularity: "word" });

  tokenize(text: string): string[] {
    const tokens: string[] = [];
    for (const part of this.segmenter.segment(text.toLowerCase())) {
      if (!part.isWordLike) {
        continue;
      }
      const token = part.segment.trim();
      if (token) {
        tokens.push(token);
      }
    }
    return tokens;
  }
}

class BasicTokenizer implements Tokenizer {
  readonly capability = "basic" as const;

  tokenize(text: string): string[] {
    const words = text.toLowerCase().match(BASIC_TOKEN_REGEX) ?? [];
    const tokens: string[] = [];
    for (const word of words) {
      if (UNSEGMENTED_RUN.test(word)) {
        tokens.push(...toBigrams(word));
      } else {
        tokens.push(word);
      }
    }
    return tokens;
  }
}

function toBigrams(run: string): string[] {
  const chars = [...run];
  if (chars.length < 2) {
    return chars;
  }
  const grams: string[] = [];
  for (let i = 0; i < chars.length - 1; i += 1) {
    grams.push(chars[i] + chars[i + 1]);
  }
  return grams;
}
