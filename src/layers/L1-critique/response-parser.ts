import { MalformedResponseError } from '../../shared/types';
import type { Classification, Critique, Finding } from '../../shared/types';
import { CritiqueOutputSchema, LegacyCritiqueOutputSchema } from './schemas';

/** error > warning > ok */
export function classify(findings: readonly Finding[]): Classification {
  if (findings.some((f) => f.severity === 'error')) return 'error';
  if (findings.some((f) => f.severity === 'warning')) return 'warning';
  return 'ok';
}

/** Strip a surrounding markdown code fence if present. */
export function stripCodeFence(raw: string): string {
  const content = raw.trim();
  if (!content.startsWith('```')) return content;
  const firstNewline = content.indexOf('\n');
  const lastFence = content.lastIndexOf('```');
  if (firstNewline !== -1 && lastFence > firstNewline) {
    return content.slice(firstNewline + 1, lastFence).trim();
  }
  return content;
}

/**
 * Decode a raw completion into a Critique.
 * Throws MalformedResponseError for anything that is not the expected JSON.
 */
export function parseCritique(raw: string): Critique {
  const content = stripCodeFence(raw);

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new MalformedResponseError(
      `Completion is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      raw,
      err instanceof Error ? err : undefined,
    );
  }

  let functionName: string | null;
  let findings: Finding[];
  let suggestion: string | null;

  const current = CritiqueOutputSchema.safeParse(parsed);
  if (current.success) {
    functionName = current.data.function ?? null;
    findings = current.data.findings.map((f) => ({ severity: f.severity, message: f.message.trim() }));
    suggestion = current.data.suggested_docstring ?? null;
  } else {
    const legacy = LegacyCritiqueOutputSchema.safeParse(parsed);
    if (!legacy.success) {
      const issues = current.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new MalformedResponseError(`Completion does not match the critique schema: ${issues}`, raw);
    }
    functionName = legacy.data.function ?? null;
    findings = [
      { severity: 'error' as const, message: legacy.data.error.trim() },
      { severity: 'warning' as const, message: legacy.data.warning.trim() },
    ];
    suggestion = legacy.data.solution ?? null;
  }

  findings = findings.filter((f) => f.message.length > 0);
  const classification = classify(findings);

  // A suggestion without any finding has nothing to justify it.
  const suggestedDoc = findings.length > 0 && suggestion && suggestion.trim() ? suggestion : null;

  return {
    functionName: functionName || null,
    classification,
    findings,
    suggestedDoc,
    fixable: classification === 'error' && suggestedDoc !== null,
  };
}
