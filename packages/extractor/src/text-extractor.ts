import type { MediaType, SourceDocument, TextBlock } from "@ingestline/types";
import { CancelledError, CorruptDocumentError, UnsupportedFormatError } from "@ingestline/errors";
import type { ExtractOptions, IExtractor } from "./extractor.interface.js";
import { splitSections } from "./sections.js";

const TEXT_MEDIA_TYPES: readonly MediaType[] = [
  "text/plain",
  "text/markdown",
  "text/html",
  "text/csv",
  "application/json",
];

const HTML_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  ndash: "-",
  mdash: "-",
  hellip: "...",
  copy: "(c)",
};

const BLOCK_TAGS =
  "p|div|br|li|ul|ol|tr|table|section|article|header|footer|blockquote|pre|hr|dt|dd";

/**
 * Local extraction for text formats. Nothing leaves the process; every
 * block is page 1.
 */
export class TextExtractor implements IExtractor {
  readonly supportedMediaTypes = TEXT_MEDIA_TYPES;

  async *extract(document: SourceDocument, options?: ExtractOptions): AsyncIterable<TextBlock> {
    if (options?.signal?.aborted) {
      throw new CancelledError(undefined, { documentId: document.id });
    }
    const text = decodeUtf8(document);

    let order = 0;
    for (const { label, text: blockText } of this.toSections(document, text)) {
      const cleaned = blockText.trim();
      if (cleaned.length === 0) {
        continue;
      }
      yield {
        documentId: document.id,
        text: cleaned,
        pageNumber: 1,
        sectionLabel: label,
        order: order++,
      };
    }
  }

  private toSections(
    document: SourceDocument,
    text: string,
  ): Array<{ label: string | null; text: string }> {
    switch (document.mediaType) {
      case "text/plain":
      case "text/markdown":
        return splitSections(text).sections;
      case "text/html":
        return splitSections(htmlToText(text)).sections;
      case "text/csv":
        return [{ label: null, text: csvToText(text) }];
      case "application/json":
        return jsonToSections(text);
      default:
        throw new UnsupportedFormatError(document.mediaType, { documentId: document.id });
    }
  }
}

function decodeUtf8(document: SourceDocument): string {
  // fatal: invalid sequences throw; the BOM is stripped by default
  const decoder = new TextDecoder("utf-8", { fatal: true });
  try {
    return decoder.decode(document.content);
  } catch (err: unknown) {
    throw new CorruptDocumentError(`${document.id} is not valid UTF-8`, {
      documentId: document.id,
      cause: err,
    });
  }
}

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith("#x") || entity.startsWith("#X")) {
      return safeFromCodePoint(Number.parseInt(entity.slice(2), 16), match);
    }
    if (entity.startsWith("#")) {
      return safeFromCodePoint(Number.parseInt(entity.slice(1), 10), match);
    }
    return HTML_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function safeFromCodePoint(codePoint: number, fallback: string): string {
  return Number.isInteger(codePoint) && codePoint >= 0 && codePoint <= 0x10ffff
    ? String.fromCodePoint(codePoint)
    : fallback;
}

/**
 * Reduce HTML to Markdown-flavoured text: headings become ATX headings so the
 * section splitter can label them, block elements become line breaks.
 */
export function htmlToText(html: string): string {
  const withoutCode = html
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "");

  const withHeadings = withoutCode.replace(
    /<h([1-6])[^>]*>([\s\S]*?)<\/h\1>/gi,
    (_match, level: string, inner: string) => {
      const title = inner.replace(/<[^>]+>/g, " ").replace(/\s+/g, " ").trim();
      return `\n${"#".repeat(Number(level))} ${title}\n`;
    },
  );

  const stripped = withHeadings
    .replace(new RegExp(`</?(?:${BLOCK_TAGS})\\b[^>]*>`, "gi"), "\n")
    .replace(/<[^>]+>/g, "");

  return decodeEntities(stripped)
    .split(/\r?\n/)
    .map((line) => line.replace(/[ \t\u00a0]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/** RFC 4180 rows: quoted fields may hold commas, doubled quotes and newlines. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") {
        i++;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += ch;
    }
  }

  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

function csvToText(text: string): string {
  return parseCsv(text)
    .map((cells) => cells.map((cell) => cell.trim()))
    .filter((cells) => cells.some((cell) => cell.length > 0))
    .map((cells) => cells.join(" | "))
    .join("\n");
}

/**
 * Top-level array elements and object properties become sections. Text that
 * does not parse as JSON is still text: it becomes a single unlabeled section.
 */
function jsonToSections(text: string): Array<{ label: string | null; text: string }> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return [{ label: null, text }];
  }

  if (Array.isArray(parsed)) {
    return parsed.map((value: unknown, index) => ({
      label: String(index),
      text: JSON.stringify(value, null, 2),
    }));
  }
  if (typeof parsed === "object" && parsed !== null) {
    return Object.entries(parsed).map(([key, value]) => ({
      label: key,
      text: JSON.stringify(value, null, 2),
    }));
  }
  return [{ label: null, text: typeof parsed === "string" ? parsed : JSON.stringify(parsed) }];
}
