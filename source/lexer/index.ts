export {TreeSitterLexer, LANGUAGE_WASM_FILES, getWasmBasePath} from './tree-sitter.js';
export {tokenizeSpans, isDocComment, createLocator, type LeafSpan} from './tokens.js';
export * from './types.js';
