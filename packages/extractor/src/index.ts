export type { IExtractor, ExtractOptions } from "./extractor.interface.js";
export { detectMediaType, isBinaryMediaType, matchesSignature } from "./media-type.js";
export { splitSections } from "./sections.js";
export type { Section, SplitSectionsResult } from "./sections.js";
export { TextExtractor, htmlToText, parseCsv } from "./text-extractor.js";
export { recognitionResultSchema, recognitionPageSchema } from "./recognition-service.js";
export type {
  ITextRecognitionService,
  RecognitionResult,
  RecognitionPage,
  RecognizeOptions,
} from "./recognition-service.js";
export { HttpTextRecognitionService } from "./http-recognition-service.js";
export type { HttpRecognitionServiceConfig } from "./http-recognition-service.js";
export { RecognitionExtractor, splitPages } from "./recognition-extractor.js";
export type { RecognitionExtractorDeps } from "./recognition-extractor.js";
export { ExtractorRegistry } from "./registry.js";
