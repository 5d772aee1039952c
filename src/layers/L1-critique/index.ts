export { buildAuditPrompt, DEFAULT_DOCSTRING_STYLE } from './prompt';
export type { AuditPrompt, AuditPromptOptions } from './prompt';
export { parseCritique, classify, stripCodeFence } from './response-parser';
export { CritiqueOutputSchema, LegacyCritiqueOutputSchema } from './schemas';
