import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";
import type { TokenizerConfig, TokenizerKind } from "@ingestline/types";
import { ConfigurationError } from "@ingestline/errors";

export interface ITokenizer {
  readonly kind: TokenizerKind;
  encode(text: string): number[];
  decode(tokens: readonly number[]): string;
}

const TIKTOKEN_ENCODINGS: readonly TiktokenEncoding[] = [
  "gpt2",
  "r50k_base",
  "p50k_base",
  "p50k_edit",
  "cl100k_base",
  "o200k_base",
];

function isTiktokenEncoding(value: string): value is TiktokenEncoding {
  return TIKTOKEN_ENCODINGS.some((encoding) => encoding === value);
}

/**
 * BPE tokenizer backed by js-tiktoken. Special-token text in documents is
 * encoded as ordinary text.
 */
export class TiktokenTokenizer implements ITokenizer {
  readonly kind = "tiktoken";
  readonly encoding: TiktokenEncoding;
  private readonly tiktoken: Tiktoken;

  constructor(encoding = "cl100k_base") {
    if (!isTiktokenEncoding(encoding)) {
      throw new ConfigurationError(`Unknown tiktoken encoding: ${encoding}`, {
        TOKENIZER_ENCODING: `must be one of ${TIKTOKEN_ENCODINGS.join(", ")}`,
      });
    }
    this.encoding = encoding;
    this.tiktoken = getEncoding(encoding);
  }

  encode(text: string): number[] {
    return this.tiktoken.encode(text, [], []);
  }

  decode(tokens: readonly number[]): string {
    return this.tiktoken.decode([...tokens]);
  }
}

/**
 * Splits text into whitespace-delimited pieces, each keeping its trailing
 * whitespace. Decoding concatenates pieces, so the full stream decodes back
 * to the input exactly. Ids come from a vocabulary local to the instance.
 */
export class WhitespaceTokenizer implements ITokenizer {
  readonly kind = "whitespace";
  private readonly ids = new Map<string, number>();
  private readonly pieces: string[] = [];

  encode(text: string): number[] {
    const matches = text.match(/\S+\s*|\s+/g) ?? [];
    return matches.map((piece) => this.idFor(piece));
  }

  decode(tokens: readonly number[]): string {
    return tokens
      .map((token) => {
        const piece = this.pieces[token];
        if (piece === undefined) {
          throw new RangeError(`Unknown token id: ${String(token)}`);
        }
        return piece;
      })
      .join("");
  }

  private idFor(piece: string): number {
    const existing = this.ids.get(piece);
    if (existing !== undefined) {
      return existing;
    }
    const id = this.pieces.length;
    this.pieces.push(piece);
    this.ids.set(piece, id);
    return id;
  }
}

export function createTokenizer(config: TokenizerConfig): ITokenizer {
  switch (config.kind) {
    case "tiktoken":
      return new TiktokenTokenizer(config.encoding);
    case "whitespace":
      return new WhitespaceTokenizer();
    default:
      throw new ConfigurationError(`Unknown tokenizer: ${String(config.kind)}`);
  }
}
