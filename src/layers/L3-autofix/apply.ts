import { ApplyFixError } from '../../shared/types';
import type { Critique, FunctionUnit, Span } from '../../shared/types';
import { formatDocstring, quoteOf, DEFAULT_QUOTE } from './docstring-format';

/** Replace source[start, end) with `text`. */
export interface TextEdit {
  start: number;
  end: number;
  text: string;
  unitName: string;
}

export interface EditResult {
  text: string;
  applied: TextEdit[];
  skipped: TextEdit[];
}

function textAt(source: string, span: Span): string | null {
  if (span.start < 0 || span.end > source.length || span.start > span.end) return null;
  return source.slice(span.start, span.end);
}

function newlineOf(source: string): string {
  return source.includes('\r\n') ? '\r\n' : '\n';
}

/**
 * Compute the edit that installs the critique's suggested docstring.
 * Returns null when the critique is not fixable. Throws ApplyFixError when the
 * unit's offsets no longer match `source`.
 */
export function planFix(source: string, unit: FunctionUnit, critique: Critique): TextEdit | null {
  if (!critique.fixable || !critique.suggestedDoc) return null;

  const newline = newlineOf(source);
  const context = { unit: unit.name, line: unit.line };

  if (unit.docSpan) {
    if (textAt(source, unit.docSpan) !== unit.docText) {
      throw new ApplyFixError(`Docstring of ${unit.name} is no longer at its recorded offsets`, context);
    }
    const quote = unit.docText ? quoteOf(unit.docText) : DEFAULT_QUOTE;
    return {
      start: unit.docSpan.start,
      end: unit.docSpan.end,
      text: formatDocstring(critique.suggestedDoc, unit.bodyIndent, quote, newline),
      unitName: unit.name,
    };
  }

  if (textAt(source, unit.signatureSpan) !== unit.signatureText) {
    throw new ApplyFixError(`Signature of ${unit.name} is no longer at its recorded offsets`, context);
  }

  const doc = formatDocstring(critique.suggestedDoc, unit.bodyIndent, DEFAULT_QUOTE, newline);

  if (unit.bodyOnHeaderLine) {
    const gap = textAt(source, { start: unit.signatureSpan.end, end: unit.bodySpan.start });
    if (gap === null || gap.trim() !== '') {
      throw new ApplyFixError(`Unexpected text between the signature and body of ${unit.name}`, context);
    }
    return {
      start: unit.signatureSpan.end,
      end: unit.bodySpan.start,
      text: `${newline}${unit.bodyIndent}${doc}${newline}${unit.bodyIndent}`,
      unitName: unit.name,
    };
  }

  return {
    start: unit.bodySpan.start,
    end: unit.bodySpan.start,
    text: `${doc}${newline}${unit.bodyIndent}`,
    unitName: unit.name,
  };
}

/**
 * Apply edits planned against the same original text in one left-to-right
 * pass. An edit overlapping one already applied is skipped.
 */
export function applyEdits(source: string, edits: readonly TextEdit[]): EditResult {
  const ordered = [...edits].sort((a, b) => a.start - b.start);
  const applied: TextEdit[] = [];
  const skipped: TextEdit[] = [];
  let out = '';
  let cursor = 0;
  let lastInsertAt = -1;

  for (const edit of ordered) {
    const overlaps = edit.start < cursor || (edit.start === edit.end && edit.start === lastInsertAt);
    if (overlaps || edit.end > source.length || edit.start > edit.end) {
      skipped.push(edit);
      continue;
    }
    out += source.slice(cursor, edit.start) + edit.text;
    cursor = edit.end;
    if (edit.start === edit.end) lastInsertAt = edit.start;
    applied.push(edit);
  }

  out += source.slice(cursor);
  return { text: out, applied, skipped };
}

/**
 * Single-unit form: the new file text, or `source` unchanged when the
 * critique is not an error with a suggestion.
 */
export function applyFix(source: string, unit: FunctionUnit, critique: Critique): string {
  const edit = planFix(source, unit, critique);
  if (!edit) return source;
  return applyEdits(source, [edit]).text;
}
