import { promises as fs } from "node:fs";
import path from "node:path";
import * as cheerio from "cheerio";
import registerDebug from "debug";
import { ExtractionError } from "../../domain/errors.js";
import { normalizeText } from "../../utils/text.js";

const debugLoader = registerDebug("kbqa:loader");

const SUPPORTED_EXTENSIONS = new Set([".md", ".txt", ".html", ".htm", ".pdf"]);
const BLOCK_SELECTOR = "h1, h2, h3, h4, h5, h6, p, li, pre, blockquote, td, th, dt, dd, figcaption";
const FETCH_TIMEOUT_MS = 20_000;

/** Turns a file path or an http(s) URL into plain text. */
export interface Extractor {
  extract(locator: string): Promise<string>;
}

export function isSupportedDocumentExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

export function isWebLocator(locator: string): boolean {
  return /^https?:\/\//i.test(locator);
}

export class DocumentExtractor implements Extractor {
  async extract(locator: string): Promise<string> {
    if (isWebLocator(locator)) {
      return loadWebPageText(locator);
    }
    return loadDocumentText(locator);
  }
}

export async function loadDocumentText(filePath: string): Promise<string> {
  const ext = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.has(ext)) {
    throw new ExtractionError(
      "unsupported_format",
      `Unsupported extension: ${ext || "(none)"}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
    );
  }

  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (error) {
    throw new ExtractionError("parse_error", `Cannot read ${filePath}.`, { cause: error });
  }
  return loadDocumentTextFromBuffer(filePath, data);
}

export async function loadDocumentTextFromBuffer(sourceName: string, data: Buffer): Promise<string> {
  const ext = path.extname(sourceName).toLowerCase();

  if (ext === ".md" || ext === ".txt") {
    return normalizeText(data.toString("utf-8"));
  }
  if (ext === ".html" || ext === ".htm") {
    return htmlToText(data.toString("utf-8"));
  }
  if (ext === ".pdf") {
    return loadPdfTextFromBuffer(sourceName, data);
  }

  throw new ExtractionError("unsupported_format", `Unsupported extension: ${ext || "(none)"}.`);
}

/**
 * Block-level elements become paragraphs separated by blank lines so that paragraph chunking
 * sees the page structure. Script, style and navigation chrome are dropped.
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $("script, style, noscript, iframe, svg, nav, header, footer").remove();

  const blocks = $(BLOCK_SELECTOR)
    .filter((_, element) => $(element).find(BLOCK_SELECTOR).length === 0)
    .map((_, element) => $(element).text().replace(/\s+/g, " ").trim())
    .get()
    .filter((text) => text.length > 0);

  if (blocks.length > 0) {
    return normalizeText(blocks.join("\n\n"));
  }
  return normalizeText($.root().text().replace(/[^\S\n]+/g, " "));
}

export async function loadWebPageText(url: string): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: "text/html,text/plain;q=0.9" },
      signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
    });
  } catch (error) {
    throw new ExtractionError("parse_error", `Cannot fetch ${url}.`, { cause: error });
  }

  if (!response.ok) {
    throw new ExtractionError("parse_error", `Fetching ${url} failed with status ${response.status}.`);
  }

  const contentType = response.headers.get("content-type") ?? "";
  const body = await response.text();
  if (contentType.includes("text/plain")) {
    return normalizeText(body);
  }
  if (contentType && !contentType.includes("html")) {
    throw new ExtractionError("unsupported_format", `Unsupported content type at ${url}: ${contentType}.`);
  }
  return htmlToText(body);
}

async function loadPdfTextFromBuffer(sourceName: string, data: Buffer): Promise<string> {
  const { PDFParse } = await import("pdf-parse");
  const parser = new PDFParse({ data });
  try {
    const parsed = await parser.getText();
    const text = normalizeText(parsed.text);
    debugLoader(`parsed ${sourceName}: ${text.length} chars`);
    return text;
  } catch (error) {
    throw new ExtractionError("parse_error", `Cannot parse PDF ${sourceName}.`, { cause: error });
  } finally {
    await parser.destroy();
  }
}
