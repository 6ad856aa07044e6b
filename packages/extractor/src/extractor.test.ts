import { describe, it, expect, vi, type Mock } from "vitest";
import type { MediaType, SourceDocument, TextBlock } from "@ingestline/types";
import {
  CorruptDocumentError,
  ExtractionServiceError,
  RetryPolicy,
  UnsupportedFormatError,
} from "@ingestline/errors";
import { detectMediaType, matchesSignature } from "./media-type.js";
import { splitSections } from "./sections.js";
import { TextExtractor, htmlToText } from "./text-extractor.js";
import { RecognitionExtractor, splitPages } from "./recognition-extractor.js";
import type { RecognitionResult } from "./recognition-service.js";
import { ExtractorRegistry } from "./registry.js";

function makeDocument(
  id: string,
  mediaType: MediaType,
  content: Uint8Array | string,
): SourceDocument {
  const bytes = typeof content === "string" ? new TextEncoder().encode(content) : content;
  return { id, path: `/input/${id}`, content: bytes, mediaType, sizeBytes: bytes.length, contentHash: "hash" };
}

async function collect(blocks: AsyncIterable<TextBlock>): Promise<TextBlock[]> {
  const result: TextBlock[] = [];
  for await (const block of blocks) {
    result.push(block);
  }
  return result;
}

function fakeService(
  impl: () => Promise<RecognitionResult>,
): { name: string; recognize: Mock<() => Promise<RecognitionResult>> } {
  return { name: "fake", recognize: vi.fn(impl) };
}

function instantRetry(maxAttempts = 3): RetryPolicy {
  return new RetryPolicy({ maxAttempts, sleep: () => Promise.resolve(), random: () => 1 });
}

const PDF_BYTES = new TextEncoder().encode("%PDF-1.4 fake body");

describe("detectMediaType", () => {
  it("maps known extensions case-insensitively", () => {
    expect(detectMediaType("docs/report.PDF")).toBe("application/pdf");
    expect(detectMediaType("notes/readme.markdown")).toBe("text/markdown");
    expect(detectMediaType("scan.tif")).toBe("image/tiff");
    expect(detectMediaType("page.htm")).toBe("text/html");
  });

  it("falls back to octet-stream", () => {
    expect(detectMediaType("archive.zip")).toBe("application/octet-stream");
    expect(detectMediaType("Makefile")).toBe("application/octet-stream");
    expect(detectMediaType(".env")).toBe("application/octet-stream");
    expect(detectMediaType("dir.v2/file")).toBe("application/octet-stream");
  });
});

describe("matchesSignature", () => {
  it("checks magic bytes of binary formats", () => {
    expect(matchesSignature("application/pdf", PDF_BYTES)).toBe(true);
    expect(matchesSignature("application/pdf", new TextEncoder().encode("hello"))).toBe(false);
    expect(matchesSignature("image/jpeg", new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe(true);
    expect(matchesSignature("image/tiff", new Uint8Array([0x4d, 0x4d, 0x00, 0x2a]))).toBe(true);
    expect(matchesSignature("image/png", new Uint8Array([0x89, 0x50]))).toBe(false);
  });

  it("accepts any content for text formats", () => {
    expect(matchesSignature("text/plain", new Uint8Array([0x00]))).toBe(true);
  });
});

describe("splitSections", () => {
  it("splits at ATX headings and labels sections", () => {
    const { sections, lastLabel } = splitSections("intro\n# Title\nbody\n## Sub ##\nmore");

    expect(sections).toEqual([
      { label: null, text: "intro" },
      { label: "Title", text: "# Title\nbody" },
      { label: "Sub", text: "## Sub ##\nmore" },
    ]);
    expect(lastLabel).toBe("Sub");
  });

  it("carries the initial label into leading text", () => {
    const { sections } = splitSections("continued text", "Chapter 2");
    expect(sections).toEqual([{ label: "Chapter 2", text: "continued text" }]);
  });

  it("does not treat #hashtags as headings", () => {
    const { sections } = splitSections("#notaheading\ntext");
    expect(sections).toEqual([{ label: null, text: "#notaheading\ntext" }]);
  });
});

describe("TextExtractor", () => {
  const extractor = new TextExtractor();

  it("supports local text formats only", () => {
    expect(extractor.supportedMediaTypes).toContain("text/markdown");
    expect(extractor.supportedMediaTypes).toContain("application/json");
    expect(extractor.supportedMediaTypes).not.toContain("application/pdf");
  });

  it("emits markdown sections as page-1 blocks in order", async () => {
    const doc = makeDocument("guide.md", "text/markdown", "Preface\n\n# Install\nnpm i\n\n# Use\nrun it\n");
    const blocks = await collect(extractor.extract(doc));

    expect(blocks).toEqual([
      { documentId: "guide.md", text: "Preface", pageNumber: 1, sectionLabel: null, order: 0 },
      { documentId: "guide.md", text: "# Install\nnpm i", pageNumber: 1, sectionLabel: "Install", order: 1 },
      { documentId: "guide.md", text: "# Use\nrun it", pageNumber: 1, sectionLabel: "Use", order: 2 },
    ]);
  });

  it("drops a UTF-8 byte order mark", async () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...new TextEncoder().encode("hello")]);
    const blocks = await collect(extractor.extract(makeDocument("bom.txt", "text/plain", bytes)));

    expect(blocks.map((b) => b.text)).toEqual(["hello"]);
  });

  it("rejects invalid UTF-8 as corrupt", async () => {
    const doc = makeDocument("bad.txt", "text/plain", new Uint8Array([0x68, 0xff, 0xfe]));
    await expect(collect(extractor.extract(doc))).rejects.toBeInstanceOf(CorruptDocumentError);
  });

  it("emits nothing for whitespace-only text", async () => {
    const blocks = await collect(extractor.extract(makeDocument("empty.md", "text/markdown", "  \n\n")));
    expect(blocks).toEqual([]);
  });

  it("converts HTML headings into sections", async () => {
    const html =
      "<html><head><style>p{}</style><script>x()</script></head><body>" +
      "<h1>Guide</h1><p>First &amp; second</p><h2>Setup</h2><p>Run   it</p></body></html>";
    const blocks = await collect(extractor.extract(makeDocument("page.html", "text/html", html)));

    expect(blocks.map((b) => [b.sectionLabel, b.text])).toEqual([
      ["Guide", "# Guide\n\nFirst & second"],
      ["Setup", "## Setup\n\nRun it"],
    ]);
  });

  it("decodes numeric entities", () => {
    expect(htmlToText("<p>caf&#233; &#x41;</p>")).toBe("café A");
  });

  it("joins CSV cells and skips empty rows", async () => {
    const csv = 'name,notes\n"Smith, J","said ""hi"""\n\n,\nLee,ok\n';
    const blocks = await collect(extractor.extract(makeDocument("people.csv", "text/csv", csv)));

    expect(blocks).toHaveLength(1);
    expect(blocks[0]?.text).toBe('name | notes\nSmith, J | said "hi"\nLee | ok');
  });

  it("emits one block per top-level JSON property", async () => {
    const doc = makeDocument("meta.json", "application/json", '{"title":"A","tags":["x"]}');
    const blocks = await collect(extractor.extract(doc));

    expect(blocks.map((b) => [b.sectionLabel, b.text])).toEqual([
      ["title", '"A"'],
      ["tags", '[\n  "x"\n]'],
    ]);
  });

  it("emits one block per top-level JSON array element", async () => {
    const doc = makeDocument("list.json", "application/json", '[1,{"a":2}]');
    const blocks = await collect(extractor.extract(doc));

    expect(blocks.map((b) => [b.sectionLabel, b.text])).toEqual([
      ["0", "1"],
      ["1", '{\n  "a": 2\n}'],
    ]);
  });

  it("emits a JSON string scalar as plain text", async () => {
    const doc = makeDocument("s.json", "application/json", '"just text"');
    const blocks = await collect(extractor.extract(doc));
    expect(blocks.map((b) => [b.sectionLabel, b.text])).toEqual([[null, "just text"]]);
  });

  it("keeps text that does not parse as JSON as one unlabeled block", async () => {
    const doc = makeDocument("notes.json", "application/json", '  {"draft": true, // todo\n  ');
    const blocks = await collect(extractor.extract(doc));
    expect(blocks.map((b) => [b.sectionLabel, b.text])).toEqual([[null, '{"draft": true, // todo']]);
  });

  it("emits nothing for an empty JSON file", async () => {
    const doc = makeDocument("empty.json", "application/json", "");
    await expect(collect(extractor.extract(doc))).resolves.toEqual([]);
  });

  it("rejects media types it does not handle", async () => {
    const doc = makeDocument("scan.pdf", "application/pdf", PDF_BYTES);
    await expect(collect(extractor.extract(doc))).rejects.toBeInstanceOf(UnsupportedFormatError);
  });
});

describe("splitPages", () => {
  it("slices reported page spans", () => {
    const pages = splitPages({
      content: "Page one\fPage two",
      pages: [
        { pageNumber: 1, offset: 0, length: 8 },
        { pageNumber: 2, offset: 9, length: 8 },
      ],
    });
    expect(pages).toEqual([
      { pageNumber: 1, text: "Page one" },
      { pageNumber: 2, text: "Page two" },
    ]);
  });

  it("falls back to form feeds", () => {
    expect(splitPages({ content: "A\fB", pages: [] })).toEqual([
      { pageNumber: 1, text: "A" },
      { pageNumber: 2, text: "B" },
    ]);
  });

  it("treats undivided content as page 1", () => {
    expect(splitPages({ content: "all", pages: [] })).toEqual([{ pageNumber: 1, text: "all" }]);
  });
});

describe("RecognitionExtractor", () => {
  it("emits blocks per page and carries section labels across pages", async () => {
    const service = fakeService(() =>
      Promise.resolve({ content: "# Intro\nHello\fWorld", pages: [] }),
    );
    const extractor = new RecognitionExtractor({ service, retry: instantRetry() });
    const blocks = await collect(extractor.extract(makeDocument("a.pdf", "application/pdf", PDF_BYTES)));

    expect(blocks).toEqual([
      { documentId: "a.pdf", text: "# Intro\nHello", pageNumber: 1, sectionLabel: "Intro", order: 0 },
      { documentId: "a.pdf", text: "World", pageNumber: 2, sectionLabel: "Intro", order: 1 },
    ]);
  });

  it("retries retryable service errors", async () => {
    let calls = 0;
    const service = fakeService(() => {
      calls++;
      if (calls < 3) {
        return Promise.reject(new ExtractionServiceError("busy"));
      }
      return Promise.resolve({ content: "ok", pages: [] });
    });
    const extractor = new RecognitionExtractor({ service, retry: instantRetry() });
    const blocks = await collect(extractor.extract(makeDocument("a.pdf", "application/pdf", PDF_BYTES)));

    expect(service.recognize).toHaveBeenCalledTimes(3);
    expect(blocks.map((b) => b.text)).toEqual(["ok"]);
  });

  it("gives up after the retry budget", async () => {
    const service = fakeService(() => Promise.reject(new ExtractionServiceError("down")));
    const extractor = new RecognitionExtractor({ service, retry: instantRetry(2) });
    const doc = makeDocument("a.pdf", "application/pdf", PDF_BYTES);

    await expect(collect(extractor.extract(doc))).rejects.toBeInstanceOf(ExtractionServiceError);
    expect(service.recognize).toHaveBeenCalledTimes(2);
  });

  it("does not retry corrupt documents", async () => {
    const service = fakeService(() => Promise.reject(new CorruptDocumentError("bad page tree")));
    const extractor = new RecognitionExtractor({ service, retry: instantRetry() });
    const doc = makeDocument("a.pdf", "application/pdf", PDF_BYTES);

    await expect(collect(extractor.extract(doc))).rejects.toBeInstanceOf(CorruptDocumentError);
    expect(service.recognize).toHaveBeenCalledTimes(1);
  });

  it("rejects content whose magic bytes do not match without calling the service", async () => {
    const service = fakeService(() => Promise.resolve({ content: "x", pages: [] }));
    const extractor = new RecognitionExtractor({ service, retry: instantRetry() });
    const doc = makeDocument("fake.png", "image/png", "not an image");

    await expect(collect(extractor.extract(doc))).rejects.toBeInstanceOf(CorruptDocumentError);
    expect(service.recognize).not.toHaveBeenCalled();
  });
});

describe("ExtractorRegistry", () => {
  it("returns the extractor registered for a media type", () => {
    const text = new TextExtractor();
    const registry = new ExtractorRegistry([text]);

    expect(registry.getExtractor("text/csv")).toBe(text);
    expect(registry.supports("image/png")).toBe(false);
  });

  it("throws UnsupportedFormat for unregistered types", () => {
    const registry = new ExtractorRegistry([new TextExtractor()]);

    expect(() => registry.getExtractor("application/pdf")).toThrow(UnsupportedFormatError);
    expect(() => registry.getExtractor("application/octet-stream")).toThrow(
      "Unsupported media type: application/octet-stream",
    );
  });
});
