import { describe, it, expect } from 'vitest';
import { buildAuditPrompt } from '../../../src/layers/L1-critique';
import type { FunctionUnit } from '../../../src/shared/types';

function makeUnit(overrides: Partial<FunctionUnit> = {}): FunctionUnit {
  const sourceText = 'def compute(a, b):\n    return a + b';
  return {
    name: 'compute',
    kind: 'function',
    line: 4,
    span: { start: 0, end: sourceText.length },
    signatureSpan: { start: 0, end: 18 },
    bodySpan: { start: 23, end: sourceText.length },
    bodyIndent: '    ',
    bodyOnHeaderLine: false,
    sourceText,
    signatureText: 'def compute(a, b):',
    ...overrides,
  };
}

describe('buildAuditPrompt', () => {
  it('embeds the unit source verbatim inside a named block', () => {
    const { user } = buildAuditPrompt(makeUnit());
    expect(user).toContain('<function name="compute" line="4">\ndef compute(a, b):\n    return a + b\n</function>');
  });

  it('defaults to the numpydoc convention', () => {
    const { user } = buildAuditPrompt(makeUnit());
    expect(user.split('\n')[0]).toBe(
      'Review the docstring of the Python function below. The docstring should follow the numpydoc convention.',
    );
  });

  it('uses the requested docstring style', () => {
    const { user } = buildAuditPrompt(makeUnit(), { docstringStyle: 'google' });
    expect(user.split('\n')[0]).toBe(
      'Review the docstring of the Python function below. The docstring should follow the google convention.',
    );
  });

  it('asks about classes when the unit is a class', () => {
    const { user } = buildAuditPrompt(makeUnit({ kind: 'class', name: 'Box', sourceText: 'class Box:\n    pass' }));
    expect(user).toContain('<class name="Box" line="4">\nclass Box:\n    pass\n</class>');
  });

  it('states the severity rules and the response schema', () => {
    const { user } = buildAuditPrompt(makeUnit());
    expect(user).toContain('A missing docstring is an error.');
    expect(user).toContain('"suggested_docstring"');
    expect(user).toContain('{ "severity": "error" | "warning", "message": "one concern, described in full" }');
  });

  it('returns the same system prompt for every unit', () => {
    const a = buildAuditPrompt(makeUnit());
    const b = buildAuditPrompt(makeUnit({ name: 'other' }));
    expect(a.system).toBe(b.system);
    expect(a.system).toContain('Respond with ONLY a JSON object');
  });

  it('is deterministic', () => {
    expect(buildAuditPrompt(makeUnit())).toEqual(buildAuditPrompt(makeUnit()));
  });
});
