export type { ITokenizer } from "./tokenizer.js";
export { TiktokenTokenizer, WhitespaceTokenizer, createTokenizer } from "./tokenizer.js";
export { TokenWindowChunker, validateChunkingConfig } from "./token-window-chunker.js";
export { sha256Hex, documentKey, chunkId, blobKey } from "./identifiers.js";
