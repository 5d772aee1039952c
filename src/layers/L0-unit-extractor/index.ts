export { initParser, parsePythonSource, detectLanguage, isAuditableFile, EXTENSION_MAP } from './ast-parser';
export type { DefinitionRecord, ParsedSource } from './ast-parser';
export { extractFunctionUnits, FunctionUnitSequence } from './function-extractor';
export type { ExtractOptions } from './function-extractor';
