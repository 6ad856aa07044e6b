import { z } from "zod";
import type { MediaType } from "@ingestline/types";

export const recognitionPageSchema = z.object({
  pageNumber: z.number().int().positive(),
  /** Character offset into `content`. */
  offset: z.number().int().nonnegative(),
  length: z.number().int().nonnegative(),
});

export const recognitionResultSchema = z.object({
  content: z.string(),
  pages: z.array(recognitionPageSchema).default([]),
});

export type RecognitionPage = z.infer<typeof recognitionPageSchema>;
export type RecognitionResult = z.infer<typeof recognitionResultSchema>;

export interface RecognizeOptions {
  signal?: AbortSignal;
}

/**
 * Remote text recognition (OCR / layout analysis) for PDFs and images.
 */
export interface ITextRecognitionService {
  readonly name: string;
  recognize(
    content: Uint8Array,
    mediaType: MediaType,
    options?: RecognizeOptions,
  ): Promise<RecognitionResult>;
}
