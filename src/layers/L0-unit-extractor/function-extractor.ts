import type { FunctionUnit, Span } from '../../shared/types';
import { parsePythonSource, type DefinitionRecord, type ParsedSource } from './ast-parser';

export interface ExtractOptions {
  /** When non-empty, only units with exactly this name are yielded. */
  codeBlockName?: string;
  /** Also yield class definitions as units. */
  includeClasses?: boolean;
}

const DEFAULT_INDENT_STEP = '    ';

/**
 * Finite, restartable sequence of units. Each iteration walks the detached
 * span records again and builds units on demand, so consumers may stop early
 * or iterate more than once.
 */
export class FunctionUnitSequence implements Iterable<FunctionUnit> {
  constructor(
    private readonly parsed: ParsedSource,
    private readonly options: ExtractOptions = {},
  ) {}

  *[Symbol.iterator](): Iterator<FunctionUnit> {
    const { codeBlockName, includeClasses = false } = this.options;
    for (const record of this.parsed.definitions) {
      if (record.kind === 'class' && !includeClasses) continue;
      if (codeBlockName && record.name !== codeBlockName) continue;
      yield toFunctionUnit(this.parsed.source, record);
    }
  }

  toArray(): FunctionUnit[] {
    return Array.from(this);
  }
}

/**
 * Parse `source` and return its function units in source order.
 * Rejects with ParseError when the text is not valid Python.
 */
export async function extractFunctionUnits(
  source: string,
  options: ExtractOptions = {},
): Promise<FunctionUnitSequence> {
  const parsed = await parsePythonSource(source);
  return new FunctionUnitSequence(parsed, options);
}

function toFunctionUnit(source: string, record: DefinitionRecord): FunctionUnit {
  const span: Span = { start: record.start, end: record.end };
  const signatureSpan: Span = { start: record.start, end: record.signatureEnd };
  const docSpan: Span | undefined = record.doc
    ? { start: record.doc.start, end: record.doc.end }
    : undefined;

  return {
    name: record.name,
    kind: record.kind,
    line: record.line,
    span,
    signatureSpan,
    docSpan,
    bodySpan: { start: record.bodyStart, end: record.bodyEnd },
    bodyIndent: bodyIndentOf(source, record),
    bodyOnHeaderLine: record.bodyOnHeaderLine,
    sourceText: source.slice(span.start, span.end),
    signatureText: source.slice(signatureSpan.start, signatureSpan.end),
    docText: docSpan ? source.slice(docSpan.start, docSpan.end) : undefined,
  };
}

function leadingWhitespace(text: string): string {
  const match = /^[ \t]*/.exec(text);
  return match ? match[0] : '';
}

function bodyIndentOf(source: string, record: DefinitionRecord): string {
  const headerIndent = leadingWhitespace(source.slice(record.headerLineStart));
  if (record.bodyOnHeaderLine) {
    return headerIndent + DEFAULT_INDENT_STEP;
  }
  // The docstring (or first statement) starts right after the body indent.
  const firstStatement = record.doc ? record.doc.start : record.bodyStart;
  const lineStart = source.lastIndexOf('\n', firstStatement - 1) + 1;
  const prefix = source.slice(lineStart, firstStatement);
  return /^[ \t]*$/.test(prefix) ? prefix : headerIndent + DEFAULT_INDENT_STEP;
}
