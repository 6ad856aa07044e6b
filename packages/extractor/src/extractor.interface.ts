import type { MediaType, SourceDocument, TextBlock } from "@ingestline/types";

export interface ExtractOptions {
  signal?: AbortSignal;
}

export interface IExtractor {
  readonly supportedMediaTypes: readonly MediaType[];
  /**
   * Lazily yield the document's text blocks in reading order. The returned
   * iterable is single-use.
   */
  extract(document: SourceDocument, options?: ExtractOptions): AsyncIterable<TextBlock>;
}
