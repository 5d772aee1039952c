import { describe, it, expect } from 'vitest';
import { applyEdits, applyFix, planFix, type TextEdit } from '../../../src/layers/L3-autofix';
import { extractFunctionUnits } from '../../../src/layers/L0-unit-extractor';
import { ApplyFixError } from '../../../src/shared/types';
import type { Critique, FunctionUnit } from '../../../src/shared/types';

function errorCritique(suggestedDoc: string): Critique {
  return {
    functionName: null,
    classification: 'error',
    findings: [{ severity: 'error', message: 'Docstring does not match the code.' }],
    suggestedDoc,
    fixable: true,
  };
}

async function units(source: string): Promise<FunctionUnit[]> {
  return (await extractFunctionUnits(source)).toArray();
}

describe('applyFix', () => {
  it('inserts a docstring where none exists', async () => {
    const source = 'def compute(a, b):\n    return a + b\n';
    const [unit] = await units(source);
    expect(applyFix(source, unit, errorCritique('Add two numbers.'))).toBe(
      'def compute(a, b):\n    """\n    Add two numbers.\n    """\n    return a + b\n',
    );
  });

  it('replaces an existing docstring in place', async () => {
    const source = 'def f(x):\n    """Old."""\n    return x\n';
    const [unit] = await units(source);
    const suggestion = 'Return x unchanged.\n\nParameters\n----------\nx : object\n    Any value.';
    expect(applyFix(source, unit, errorCritique(suggestion))).toBe(
      'def f(x):\n    """\n    Return x unchanged.\n\n    Parameters\n    ----------\n    x : object\n        Any value.\n    """\n    return x\n',
    );
  });

  it('keeps the quote style of the docstring it replaces', async () => {
    const source = "def f():\n    r'''Old.'''\n    pass\n";
    const [unit] = await units(source);
    expect(applyFix(source, unit, errorCritique('New.'))).toBe("def f():\n    r'''\n    New.\n    '''\n    pass\n");
  });

  it('moves a body off the header line', async () => {
    const source = 'def one(): return 1\n';
    const [unit] = await units(source);
    expect(applyFix(source, unit, errorCritique('Return one.'))).toBe(
      'def one():\n    """\n    Return one.\n    """\n    return 1\n',
    );
  });

  it('keeps backslashes in the suggestion literal', async () => {
    const source = 'def load(p):\n    return open(p)\n';
    const [unit] = await units(source);
    expect(applyFix(source, unit, errorCritique('Open a file such as C:\\users\\data.txt.'))).toBe(
      'def load(p):\n    r"""\n    Open a file such as C:\\users\\data.txt.\n    """\n    return open(p)\n',
    );
  });

  it('preserves CRLF line endings', async () => {
    const source = 'def f():\r\n    return 1\r\n';
    const [unit] = await units(source);
    expect(applyFix(source, unit, errorCritique('Doc.'))).toBe('def f():\r\n    """\r\n    Doc.\r\n    """\r\n    return 1\r\n');
  });

  it('indents nested function docstrings at their own depth', async () => {
    const source = 'def outer():\n    def inner():\n        return 1\n    return inner\n';
    const [, inner] = await units(source);
    expect(applyFix(source, inner, errorCritique('Inner.'))).toBe(
      'def outer():\n    def inner():\n        """\n        Inner.\n        """\n        return 1\n    return inner\n',
    );
  });

  it('leaves the source untouched for ok and warning critiques', async () => {
    const source = 'def f():\n    """Doc."""\n    pass\n';
    const [unit] = await units(source);
    const ok: Critique = { functionName: 'f', classification: 'ok', findings: [], suggestedDoc: null, fixable: false };
    const warning: Critique = {
      functionName: 'f',
      classification: 'warning',
      findings: [{ severity: 'warning', message: 'Typo.' }],
      suggestedDoc: 'Docs.',
      fixable: false,
    };
    expect(applyFix(source, unit, ok)).toBe(source);
    expect(applyFix(source, unit, warning)).toBe(source);
  });
});

describe('planFix', () => {
  it('rejects offsets that no longer match the text', async () => {
    const original = 'def f(x):\n    """Old."""\n    return x\n';
    const [unit] = await units(original);
    const edited = `import os\n${original}`;
    expect(() => planFix(edited, unit, errorCritique('New.'))).toThrow(ApplyFixError);
  });

  it('rejects a stale signature for a unit without docstring', async () => {
    const original = 'def f(x):\n    return x\n';
    const [unit] = await units(original);
    expect(() => planFix('def g(x):\n    return x\n', unit, errorCritique('New.')))
      .toThrow('Signature of f is no longer at its recorded offsets');
  });
});

describe('applyEdits', () => {
  it('applies several fixes planned against the same text', async () => {
    const source = 'def a():\n    return 1\n\n\ndef b():\n    return 2\n';
    const [a, b] = await units(source);
    const edits = [
      planFix(source, b, errorCritique('Return two.')),
      planFix(source, a, errorCritique('Return one.')),
    ].filter((e): e is TextEdit => e !== null);

    const result = applyEdits(source, edits);
    expect(result.skipped).toEqual([]);
    expect(result.applied.map((e) => e.unitName)).toEqual(['a', 'b']);
    expect(result.text).toBe(
      'def a():\n    """\n    Return one.\n    """\n    return 1\n\n\ndef b():\n    """\n    Return two.\n    """\n    return 2\n',
    );
  });

  it('skips an edit overlapping one already applied', () => {
    const result = applyEdits('abcdefgh', [
      { start: 0, end: 4, text: 'X', unitName: 'first' },
      { start: 2, end: 6, text: 'Y', unitName: 'second' },
    ]);
    expect(result.text).toBe('Xefgh');
    expect(result.skipped.map((e) => e.unitName)).toEqual(['second']);
  });

  it('skips a second insert at the same offset', () => {
    const result = applyEdits('ab', [
      { start: 1, end: 1, text: 'X', unitName: 'first' },
      { start: 1, end: 1, text: 'Y', unitName: 'second' },
    ]);
    expect(result.text).toBe('aXb');
    expect(result.skipped.map((e) => e.unitName)).toEqual(['second']);
  });

  it('returns the source unchanged with no edits', () => {
    expect(applyEdits('same', []).text).toBe('same');
  });
});
