import type { MediaType, SourceDocument, TextBlock } from "@ingestline/types";
import type { Logger } from "@ingestline/logger";
import { CorruptDocumentError, RetryPolicy, classifyError } from "@ingestline/errors";
import type { ExtractOptions, IExtractor } from "./extractor.interface.js";
import type { ITextRecognitionService, RecognitionResult } from "./recognition-service.js";
import { matchesSignature } from "./media-type.js";
import { splitSections } from "./sections.js";

const RECOGNITION_MEDIA_TYPES: readonly MediaType[] = [
  "application/pdf",
  "image/png",
  "image/jpeg",
  "image/tiff",
  "image/bmp",
];

export interface RecognitionExtractorDeps {
  service: ITextRecognitionService;
  retry: RetryPolicy;
  logger?: Logger;
}

interface Page {
  pageNumber: number;
  text: string;
}

/**
 * Splits recognized text into pages: reported page spans first, then form
 * feeds, otherwise everything is page 1.
 */
export function splitPages(result: RecognitionResult): Page[] {
  if (result.pages.length > 0) {
    return result.pages.map((page) => ({
      pageNumber: page.pageNumber,
      text: result.content.slice(page.offset, page.offset + page.length),
    }));
  }
  if (result.content.includes("\f")) {
    return result.content.split("\f").map((text, index) => ({ pageNumber: index + 1, text }));
  }
  return [{ pageNumber: 1, text: result.content }];
}

/**
 * Extraction for PDFs and images through the text-recognition service.
 * Service failures marked retryable are retried with the shared policy.
 */
export class RecognitionExtractor implements IExtractor {
  readonly supportedMediaTypes = RECOGNITION_MEDIA_TYPES;
  private readonly service: ITextRecognitionService;
  private readonly retry: RetryPolicy;
  private readonly logger?: Logger;

  constructor(deps: RecognitionExtractorDeps) {
    this.service = deps.service;
    this.retry = deps.retry;
    this.logger = deps.logger;
  }

  async *extract(document: SourceDocument, options?: ExtractOptions): AsyncIterable<TextBlock> {
    if (!matchesSignature(document.mediaType, document.content)) {
      throw new CorruptDocumentError(
        `${document.id} does not look like ${document.mediaType}`,
        { documentId: document.id },
      );
    }

    const signal = options?.signal;
    const result = await this.retry.execute(
      () => this.service.recognize(document.content, document.mediaType, { signal }),
      {
        signal,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          this.logger?.warn(
            { documentId: document.id, attempt, maxAttempts, delayMs, error: classifyError(error) },
            "text recognition failed, retrying",
          );
        },
      },
    );

    let order = 0;
    let label: string | null = null;
    for (const page of splitPages(result)) {
      const { sections, lastLabel } = splitSections(page.text, label);
      label = lastLabel;
      for (const section of sections) {
        yield {
          documentId: document.id,
          text: section.text,
          pageNumber: page.pageNumber,
          sectionLabel: section.label,
          order: order++,
        };
      }
    }
  }
}
