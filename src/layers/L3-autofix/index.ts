export { planFix, applyEdits, applyFix } from './apply';
export type { TextEdit, EditResult } from './apply';
export { formatDocstring, docstringBody, cleandoc, quoteOf } from './docstring-format';
export { writeFileAtomic } from './atomic-write';
