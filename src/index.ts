export const SPANPIECE_VERSION = '0.1.0';

// Tokenizers
export {
  PretrainedTokenizer,
  createWordPieceTokenizer,
  createBpeTokenizer,
  type VocabSource,
  type WordPieceTokenizerOptions,
  type BpeTokenizerOptions,
} from './tokenizers/index.js';

// Building blocks
export {
  Trie,
  Vocab,
  loadVocabulary,
  saveVocabulary,
  AddedVocabulary,
  BasicTokenizer,
  WordPieceSubTokenizer,
  BpeSubTokenizer,
  PlainAssembler,
  BertAssembler,
  BosEosAssembler,
  OffsetMapper,
  BatchEncoder,
  truncateSequences,
  padBatch,
  cleanUpTokenization,
  createAddedToken,
  tokenContent,
  SPECIAL_TOKEN_ROLES,
} from './tokenizers/index.js';

// Types
export type {
  AddedToken,
  TokenLike,
  SpecialTokensConfig,
  SpecialTokenRole,
  SpecialTokenIds,
  OffsetSpan,
  PaddingStrategy,
  TruncationStrategy,
  TextInput,
  SequencePair,
  EncodeInput,
  EncodeOptions,
  DecodeOptions,
  EncodingRecord,
  BatchEncodingRecord,
  SubTokenizer,
  SequenceAssembler,
  SequenceAssemblerFactory,
  TokenizerOptions,
  Fragment,
  VocabOptions,
  TruncationResult,
  PaddingOptions,
  BosEosOptions,
  WordPieceOptions,
  BpeOptions,
  BasicTokenizerOptions,
  AddedVocabularyOptions,
} from './tokenizers/index.js';

// Text utilities
export * from './text/index.js';

// Errors
export {
  ERROR_CODES,
  createTokenizerError,
  isTokenizerError,
  type TokenizerError,
  type TokenizerErrorCode,
} from './errors/tokenizer-error.js';

// Config
export { getRuntimeConfig, setRuntimeConfig, resetRuntimeConfig } from './config/runtime.js';
export * from './config/schema/index.js';

// Logging
export * from './debug/index.js';
