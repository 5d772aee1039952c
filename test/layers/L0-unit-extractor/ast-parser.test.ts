import { describe, it, expect } from 'vitest';
import {
  parsePythonSource,
  detectLanguage,
  isAuditableFile,
} from '../../../src/layers/L0-unit-extractor/ast-parser';
import { ParseError } from '../../../src/shared/types';

describe('detectLanguage', () => {
  it('maps .py to python', () => {
    expect(detectLanguage('pkg/module.py')).toBe('python');
  });

  it('returns null for other extensions', () => {
    expect(detectLanguage('README.md')).toBeNull();
    expect(detectLanguage('module.pyc')).toBeNull();
  });

  it('isAuditableFile follows the extension map', () => {
    expect(isAuditableFile('a.py')).toBe(true);
    expect(isAuditableFile('a.ts')).toBe(false);
  });
});

describe('parsePythonSource', () => {
  it('returns no definitions for an empty file', async () => {
    const parsed = await parsePythonSource('');
    expect(parsed.definitions).toEqual([]);
  });

  it('records functions and classes in pre-order', async () => {
    const source = [
      'class Outer:',
      '    def method(self):',
      '        def helper():',
      '            pass',
      '        return helper',
      '',
      'def top():',
      '    pass',
      '',
    ].join('\n');

    const parsed = await parsePythonSource(source);
    expect(parsed.definitions.map((d) => [d.name, d.kind, d.line])).toEqual([
      ['Outer', 'class', 1],
      ['method', 'function', 2],
      ['helper', 'function', 3],
      ['top', 'function', 7],
    ]);
  });

  it('starts a decorated definition at its first decorator', async () => {
    const source = '@first\n@second(1)\ndef wrapped():\n    pass\n';
    const parsed = await parsePythonSource(source);
    const [record] = parsed.definitions;
    expect(record.start).toBe(0);
    expect(record.line).toBe(3);
    expect(source.slice(record.start, record.signatureEnd)).toBe('@first\n@second(1)\ndef wrapped():');
  });

  it('locates the docstring literal', async () => {
    const source = 'def f(x):\n    """Return x."""\n    return x\n';
    const [record] = (await parsePythonSource(source)).definitions;
    expect(record.doc).not.toBeNull();
    if (!record.doc) return;
    expect(source.slice(record.doc.start, record.doc.end)).toBe('"""Return x."""');
    expect(source.slice(record.bodyStart, record.bodyStart + 13)).toBe('\n    return x');
  });

  it('does not treat an f-string as a docstring', async () => {
    const source = 'def f(x):\n    f"""value {x}"""\n    return x\n';
    const [record] = (await parsePythonSource(source)).definitions;
    expect(record.doc).toBeNull();
  });

  it('does not treat a bytes literal as a docstring', async () => {
    const source = 'def f():\n    b"""raw bytes"""\n    pass\n';
    const [record] = (await parsePythonSource(source)).definitions;
    expect(record.doc).toBeNull();
  });

  it('does not treat a later string statement as a docstring', async () => {
    const source = 'def f():\n    x = 1\n    """not a docstring"""\n';
    const [record] = (await parsePythonSource(source)).definitions;
    expect(record.doc).toBeNull();
  });

  it('uses the header colon, not annotation colons', async () => {
    const source = 'def typed(a: int, b: str = "x") -> dict:\n    return {}\n';
    const [record] = (await parsePythonSource(source)).definitions;
    expect(source.slice(record.start, record.signatureEnd)).toBe('def typed(a: int, b: str = "x") -> dict:');
  });

  it('flags a body on the header line', async () => {
    const source = 'def one(): return 1\n';
    const [record] = (await parsePythonSource(source)).definitions;
    expect(record.bodyOnHeaderLine).toBe(true);
    expect(source.slice(record.bodyStart, record.bodyStart + 8)).toBe('return 1');
  });

  it('throws ParseError for invalid syntax', async () => {
    await expect(parsePythonSource('def broken(:\n    pass\n')).rejects.toBeInstanceOf(ParseError);
  });

  it('reports the position of the syntax error', async () => {
    await expect(parsePythonSource('def broken(:\n    pass\n')).rejects.toThrow(/Invalid Python syntax at line \d+, column \d+/);
  });

  it('rejects a Python 2 print statement', async () => {
    await expect(parsePythonSource('print "hi"\n\ndef f():\n    pass\n'))
      .rejects.toThrow('Invalid Python syntax at line 1, column 1');
  });

  it('rejects a Python 2 exec statement', async () => {
    await expect(parsePythonSource('def f():\n    exec "x = 1"\n')).rejects.toBeInstanceOf(ParseError);
  });

  it('accepts print as a function call', async () => {
    const parsed = await parsePythonSource('print("hi")\n\ndef f():\n    pass\n');
    expect(parsed.definitions.map((d) => d.name)).toEqual(['f']);
  });
});
