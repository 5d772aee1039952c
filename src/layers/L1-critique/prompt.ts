/**
 * Audit prompt builder.
 * One function unit in, one system/user message pair out.
 */

import type { FunctionUnit } from '../../shared/types';

export const DEFAULT_DOCSTRING_STYLE = 'numpydoc';

const SYSTEM_PROMPT = `You are a coding assistant reviewing the documentation of Python functions. You are detail oriented and precise, with extensive knowledge of Python and its ecosystem.

The documentation you review is written for readers with very little coding experience. Descriptions should be verbose and must not rely on unstated assumptions.

Respond with ONLY a JSON object matching the required schema. No other text.`;

export interface AuditPromptOptions {
  docstringStyle?: string;
}

export interface AuditPrompt {
  system: string;
  user: string;
}

export function buildAuditPrompt(unit: FunctionUnit, options: AuditPromptOptions = {}): AuditPrompt {
  const style = options.docstringStyle || DEFAULT_DOCSTRING_STYLE;
  const subject = unit.kind === 'class' ? 'class' : 'function';

  const user = `Review the docstring of the Python ${subject} below. The docstring should follow the ${style} convention.

Answer these questions:
1. Does the docstring describe the functionality the code provides?
2. Does it leave out any functionality the code has?
3. Does it document functionality that does not exist in the code?
4. Are parameter and return types, and their defaults, adequately described?
5. Would an extended summary help the reader understand the ${subject} better?

A missing docstring is an error. Mismatches between the docstring and the code are errors. Typos, grammar problems, and departures from the ${style} convention are warnings. Do not report anything about imports.

<${subject} name="${unit.name}" line="${unit.line}">
${unit.sourceText}
</${subject}>

Return a JSON object with this schema:
{
  "function": "the name of the ${subject}",
  "findings": [
    { "severity": "error" | "warning", "message": "one concern, described in full" }
  ],
  "suggested_docstring": "if there are any errors, the complete corrected docstring text without quotes and without any code; otherwise null"
}

Return an empty findings array when the docstring has no problems.`;

  return { system: SYSTEM_PROMPT, user };
}
