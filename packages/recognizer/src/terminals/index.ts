export { TerminalMapper, type TerminalMapperConfig } from './mapper.js';
export { MappingError, UnmappedKeywordError, UnsupportedSymbolKindError } from './mapping-error.js';
