export { createScanner, knownHtmlTags, type Scanner, type RawBlock } from './scanner/scanner.js';
export { SyntaxKind, TokenFlags, describeToken, tokenKindName, type Token } from './scanner/token-types.js';

export * from './ast-types.js';
export * from './ast-factory.js';
export * from './ast-traversal.js';
export * from './parser-interfaces.js';
export { createDocParser, OutcomeKind, type ParseOutcome } from './core-parser.js';
export { AliasTable, parseAliasDefinition, escapeAliasValue, type AliasDefinition } from './alias-expander.js';
export { renderSymbol, isKnownSymbol, symbolCount, type SymbolFormat } from './entities.js';
export { computeTableGrid, ensureTableGrid, isHeadingRow, rowSpanOf, colSpanOf } from './table-grid.js';
export { applyIncludeOperator, createIncludeBuffer, type IncludeBuffer } from './include-operators.js';
export { findSections, type SectionLabel } from './section-finder.js';
export { expandCopies } from './copy-expander.js';
export { setDebugMode, isDebugMode } from './debug.js';
