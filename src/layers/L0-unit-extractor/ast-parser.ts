import path from 'path';
import { Parser, Language, type Node } from 'web-tree-sitter';
import { ParseError } from '../../shared/types';
import type { SupportedLanguage, ExtensionMap, UnitKind } from '../../shared/types';

// === Extension map ===

export const EXTENSION_MAP: ExtensionMap = {
  '.py': 'python',
};

export function detectLanguage(filePath: string): SupportedLanguage | null {
  const ext = path.extname(filePath);
  return EXTENSION_MAP[ext] ?? null;
}

export function isAuditableFile(filePath: string): boolean {
  return detectLanguage(filePath) !== null;
}

// === Grammar loading ===

let parserReady: Promise<void> | null = null;
let pythonGrammar: Language | null = null;

/**
 * Initialize the tree-sitter WASM runtime. Safe to call repeatedly.
 */
export function initParser(): Promise<void> {
  if (!parserReady) {
    parserReady = Parser.init();
  }
  return parserReady;
}

async function loadPythonGrammar(): Promise<Language> {
  if (pythonGrammar) return pythonGrammar;
  const wasmPath = require.resolve('tree-sitter-python/tree-sitter-python.wasm');
  pythonGrammar = await Language.load(wasmPath);
  return pythonGrammar;
}

// === Plain span records ===

/**
 * Offsets of one definition, detached from the syntax tree. All indices are
 * positions in the parsed source string.
 */
export interface DefinitionRecord {
  name: string;
  kind: UnitKind;
  /** 1-based line of the def/class keyword. */
  line: number;
  /** Start of the first decorator, or of the definition itself. */
  start: number;
  end: number;
  /** End of the header's closing colon. */
  signatureEnd: number;
  doc: { start: number; end: number; statementEnd: number } | null;
  /** First non-comment statement of the body. */
  bodyStart: number;
  bodyEnd: number;
  bodyOnHeaderLine: boolean;
  /** Offset of the first character of the def/class line. */
  headerLineStart: number;
}

export interface ParsedSource {
  source: string;
  definitions: DefinitionRecord[];
}

/**
 * Parse Python source and return every function (and class) definition as
 * plain offset data, in pre-order. Throws ParseError on any syntax error.
 */
export async function parsePythonSource(source: string): Promise<ParsedSource> {
  await initParser();
  const grammar = await loadPythonGrammar();
  const parser = new Parser();
  parser.setLanguage(grammar);

  const tree = parser.parse(source);
  if (!tree) {
    parser.delete();
    throw new ParseError('tree-sitter returned no tree');
  }

  try {
    const error = findFirstError(tree.rootNode);
    if (error || tree.rootNode.hasError) {
      const bad = error ?? tree.rootNode;
      const line = bad.startPosition.row + 1;
      const column = bad.startPosition.column + 1;
      throw new ParseError(`Invalid Python syntax at line ${line}, column ${column}`, { line, column });
    }

    const definitions: DefinitionRecord[] = [];
    collectDefinitions(tree.rootNode, source, definitions);
    return { source, definitions };
  } finally {
    tree.delete();
    parser.delete();
  }
}

// === Tree walking ===

function childrenOf(node: Node): Node[] {
  return node.children.filter((c): c is Node => c !== null);
}

function namedChildrenOf(node: Node): Node[] {
  return node.namedChildren.filter((c): c is Node => c !== null);
}

// The grammar still accepts these Python 2 statements.
const PYTHON2_STATEMENTS = new Set(['print_statement', 'exec_statement']);

function findFirstError(node: Node): Node | null {
  if (node.type === 'ERROR' || node.isMissing || PYTHON2_STATEMENTS.has(node.type)) return node;
  for (const child of childrenOf(node)) {
    const found = findFirstError(child);
    if (found) return found;
  }
  return null;
}

function collectDefinitions(node: Node, source: string, out: DefinitionRecord[]): void {
  for (const child of namedChildrenOf(node)) {
    if (child.type === 'function_definition' || child.type === 'class_definition') {
      const outer = child.parent?.type === 'decorated_definition' ? child.parent : child;
      const record = toDefinitionRecord(child, outer, source);
      if (record) out.push(record);
    }
    collectDefinitions(child, source, out);
  }
}

function toDefinitionRecord(def: Node, outer: Node, source: string): DefinitionRecord | null {
  const nameNode = def.childForFieldName('name');
  const body = def.childForFieldName('body');
  if (!nameNode || !body) return null;

  // The header colon is the last ':' token directly under the definition.
  let colon: Node | null = null;
  for (const c of childrenOf(def)) {
    if (c.type === ':' && c.endIndex <= body.startIndex) colon = c;
  }
  if (!colon) return null;

  const statements = namedChildrenOf(body).filter((c) => c.type !== 'comment');
  const first = statements[0];
  const docNode = first ? docstringLiteral(first) : null;
  const bodyStart = docNode && first ? first.endIndex : (first?.startIndex ?? body.startIndex);

  return {
    name: nameNode.text,
    kind: def.type === 'class_definition' ? 'class' : 'function',
    line: def.startPosition.row + 1,
    start: outer.startIndex,
    end: outer.endIndex,
    signatureEnd: colon.endIndex,
    doc: docNode && first
      ? { start: docNode.startIndex, end: docNode.endIndex, statementEnd: first.endIndex }
      : null,
    bodyStart,
    bodyEnd: Math.max(body.endIndex, bodyStart),
    bodyOnHeaderLine: (first?.startPosition.row ?? body.startPosition.row) === colon.startPosition.row,
    headerLineStart: source.lastIndexOf('\n', def.startIndex - 1) + 1,
  };
}

/**
 * A docstring is an expression statement holding one plain string literal.
 * f-strings and implicit concatenations are computed values, and bytes
 * literals never become `__doc__`.
 */
function docstringLiteral(statement: Node): Node | null {
  if (statement.type !== 'expression_statement') return null;
  const parts = namedChildrenOf(statement);
  if (parts.length !== 1) return null;
  const literal = parts[0];
  if (literal.type !== 'string') return null;

  for (const c of namedChildrenOf(literal)) {
    if (c.type === 'interpolation') return null;
    if (c.type === 'string_start' && /[fb]/i.test(c.text)) return null;
  }
  return literal;
}
