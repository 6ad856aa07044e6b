import type { Chunk, ChunkingConfig, TextBlock } from "@ingestline/types";
import { DEFAULT_CHUNKING_CONFIG } from "@ingestline/types";
import { ConfigurationError } from "@ingestline/errors";
import type { ITokenizer } from "./tokenizer.js";
import { chunkId } from "./identifiers.js";

/** Character span of each token in the document stream, widened to whole code points. */
interface TokenSpans {
  floor: number[];
  ceil: number[];
}

interface EncodedStream {
  text: string;
  tokens: number[];
  ranges: BlockRange[];
  spans: TokenSpans;
}

interface BlockRange {
  start: number;
  end: number;
  pageNumber: number;
  sectionLabel: string | null;
}

export function validateChunkingConfig(config: ChunkingConfig): void {
  const fields: Record<string, string> = {};
  if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
    fields["chunkSize"] = "must be a positive integer";
  }
  if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
    fields["chunkOverlap"] = "must be a non-negative integer";
  } else if (config.chunkOverlap >= config.chunkSize) {
    fields["chunkOverlap"] = "must be smaller than chunkSize";
  }
  if (Object.keys(fields).length > 0) {
    throw new ConfigurationError("Invalid chunking configuration", fields);
  }
}

/**
 * Sliding token window over the concatenated blocks of one document. Windows
 * hold `chunkSize` tokens and advance by `chunkSize - chunkOverlap`; the last
 * one keeps whatever remains.
 */
export class TokenWindowChunker {
  readonly config: ChunkingConfig;
  private readonly tokenizer: ITokenizer;

  constructor(tokenizer: ITokenizer, config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG) {
    validateChunkingConfig(config);
    this.tokenizer = tokenizer;
    this.config = { ...config };
  }

  chunk(documentId: string, blocks: readonly TextBlock[]): Chunk[] {
    const { text, tokens, ranges, spans } = this.encodeBlocks(blocks);
    if (tokens.length === 0) {
      return [];
    }

    const { chunkSize, chunkOverlap } = this.config;
    const step = chunkSize - chunkOverlap;
    const chunks: Chunk[] = [];

    for (let start = 0, sequence = 0; ; start += step, sequence++) {
      const end = Math.min(start + chunkSize, tokens.length);
      const window = tokens.slice(start, end);
      const spanned = ranges.filter((range) => range.start < end && range.end > start);

      chunks.push(
        Object.freeze({
          id: chunkId(documentId, sequence),
          documentId,
          sequence,
          text: text.slice(spans.floor[start] ?? 0, spans.ceil[end - 1] ?? text.length),
          tokenCount: window.length,
          startOffset: start,
          endOffset: end,
          pageNumbers: Object.freeze(
            [...new Set(spanned.map((range) => range.pageNumber))].sort((a, b) => a - b),
          ),
          sectionLabel: spanned[0]?.sectionLabel ?? null,
        }),
      );

      if (end === tokens.length) {
        break;
      }
    }

    return chunks;
  }

  /** Blocks are separated by a blank line so the stream keeps paragraph breaks. */
  private encodeBlocks(blocks: readonly TextBlock[]): EncodedStream {
    const tokens: number[] = [];
    const ranges: BlockRange[] = [];
    const spans: TokenSpans = { floor: [], ceil: [] };
    let stream = "";

    blocks.forEach((block, index) => {
      const text = index < blocks.length - 1 ? `${block.text}\n\n` : block.text;
      const encoded = this.tokenizer.encode(text);
      if (encoded.length === 0) {
        return;
      }
      ranges.push({
        start: tokens.length,
        end: tokens.length + encoded.length,
        pageNumber: block.pageNumber,
        sectionLabel: block.sectionLabel,
      });
      this.mapSpans(text, encoded, stream.length, spans);
      for (const token of encoded) {
        tokens.push(token);
      }
      stream += text;
    });

    return { text: stream, tokens, ranges, spans };
  }

  /**
   * BPE tokens can split a multi-byte character. Consecutive tokens are
   * grouped until they decode to whole characters of `text`; every token in a
   * group spans the group's characters.
   */
  private mapSpans(text: string, encoded: readonly number[], base: number, spans: TokenSpans): void {
    let offset = 0;
    let groupStart = 0;

    for (let i = 0; i < encoded.length; i++) {
      const decoded = this.tokenizer.decode(encoded.slice(groupStart, i + 1));
      if (decoded.includes("\uFFFD") && !text.startsWith(decoded, offset)) {
        continue;
      }
      for (let j = groupStart; j <= i; j++) {
        spans.floor.push(base + offset);
        spans.ceil.push(base + offset + decoded.length);
      }
      offset += decoded.length;
      groupStart = i + 1;
    }

    // an unfinished group keeps the rest of the block
    for (let j = groupStart; j < encoded.length; j++) {
      spans.floor.push(base + offset);
      spans.ceil.push(base + text.length);
    }
  }
}
