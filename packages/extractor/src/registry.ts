import type { MediaType } from "@ingestline/types";
import { UnsupportedFormatError } from "@ingestline/errors";
import type { IExtractor } from "./extractor.interface.js";

/**
 * Maps media types to extractors. There is no fallback: an unregistered type
 * is an `UnsupportedFormat` failure.
 */
export class ExtractorRegistry {
  private readonly extractors = new Map<MediaType, IExtractor>();

  constructor(extractors: Iterable<IExtractor> = []) {
    for (const extractor of extractors) {
      this.register(extractor);
    }
  }

  register(extractor: IExtractor): this {
    for (const mediaType of extractor.supportedMediaTypes) {
      this.extractors.set(mediaType, extractor);
    }
    return this;
  }

  supports(mediaType: MediaType): boolean {
    return this.extractors.has(mediaType);
  }

  getExtractor(mediaType: MediaType): IExtractor {
    const extractor = this.extractors.get(mediaType);
    if (!extractor) {
      throw new UnsupportedFormatError(mediaType);
    }
    return extractor;
  }
}
