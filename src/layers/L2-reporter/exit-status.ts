import type { AuditCounts } from '../../shared/types';

export const EXIT_OK = 0;
/** Findings (or units that could not be audited) are present. */
export const EXIT_FINDINGS = 1;
/** Unparsable input, unreachable completion service, bad configuration. */
export const EXIT_FATAL = 2;

export interface ExitStatusOptions {
  errorOnWarnings: boolean;
}

export function computeExitCode(counts: AuditCounts, options: ExitStatusOptions): number {
  if (counts.transportFailure || counts.parseFailures > 0) return EXIT_FATAL;
  if (counts.errors > 0 || counts.unresolved > 0) return EXIT_FINDINGS;
  if (options.errorOnWarnings && counts.warnings > 0) return EXIT_FINDINGS;
  return EXIT_OK;
}
