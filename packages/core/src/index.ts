/**
 * @bytepair/core -- shared errors, types and ports.
 */
export {
  TokenizerError,
  InsufficientDataError,
  CorruptStateError,
  ConfigError,
} from "./errors.js";

export { BYTE_VOCAB_SIZE } from "./types.js";
export type {
  TokenId,
  Merge,
  TokenizerArtifacts,
  TrainReport,
} from "./types.js";

export { TokenizerService } from "./interfaces.js";
export type { Tokenizer } from "./interfaces.js";

export { Registry } from "./registry.js";
