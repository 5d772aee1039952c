const TRIPLE_QUOTED = /([rRuU]?)("""|''')([\s\S]*?)\2/;

export interface DocstringQuote {
  prefix: string;
  quote: '"""' | "'''";
}

export const DEFAULT_QUOTE: DocstringQuote = { prefix: '', quote: '"""' };

/**
 * Quote style of an existing docstring literal. Single-quoted literals are
 * upgraded to triple quotes since the replacement spans several lines.
 */
export function quoteOf(literal: string): DocstringQuote {
  const match = /^([A-Za-z]*)('''|""")?/.exec(literal);
  const prefix = match && /^[rRuU]?$/.test(match[1]) ? match[1] : '';
  const quote = match?.[2] === "'''" || (!match?.[2] && literal.slice(prefix.length).startsWith("'"))
    ? "'''"
    : '"""';
  return { prefix, quote };
}

/**
 * Body text of a suggestion. Models sometimes return the docstring with its
 * quotes, or the whole function around it; the first triple-quoted literal
 * wins in both cases.
 */
export function docstringBody(suggestion: string): string {
  const match = TRIPLE_QUOTED.exec(suggestion);
  return match ? match[3] : suggestion;
}

/** Same rules as Python's inspect.cleandoc. */
export function cleandoc(text: string): string[] {
  const lines = text.replace(/\t/g, '    ').split(/\r?\n/);
  let margin = Infinity;
  for (const line of lines.slice(1)) {
    const content = line.trimStart();
    if (content) margin = Math.min(margin, line.length - content.length);
  }

  const cleaned = [lines[0].trimStart()];
  for (const line of lines.slice(1)) {
    cleaned.push(margin === Infinity ? line.trimEnd() : line.slice(margin).trimEnd());
  }

  while (cleaned.length > 0 && !cleaned[0]) cleaned.shift();
  while (cleaned.length > 0 && !cleaned[cleaned.length - 1]) cleaned.pop();
  return cleaned;
}

/**
 * Render a suggestion as a docstring literal whose continuation lines sit at
 * `indent`. The opening quote is not indented: it replaces text that already
 * follows the body indentation.
 *
 * Backslashes are kept literal: a plain literal gains an `r` prefix, and a
 * `u` literal (which cannot be raw) has them doubled.
 */
export function formatDocstring(
  suggestion: string,
  indent: string,
  quote: DocstringQuote = DEFAULT_QUOTE,
  newline = '\n',
): string {
  let prefix = quote.prefix;
  let lines = cleandoc(docstringBody(suggestion));

  if (!/[rR]/.test(prefix) && lines.some((line) => line.includes('\\'))) {
    if (prefix) {
      lines = lines.map((line) => line.replace(/\\/g, '\\\\'));
    } else {
      prefix = 'r';
    }
  }

  const escaped = lines.map((line) =>
    line.split(quote.quote).join(quote.quote === '"""' ? '\\"\\"\\"' : "\\'\\'\\'"),
  );
  const body = escaped.map((line) => (line ? `${indent}${line}` : '')).join(newline);
  return `${prefix}${quote.quote}${newline}${body}${newline}${indent}${quote.quote}`;
}
