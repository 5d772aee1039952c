import type { AuditCounts, Critique, ResolvedConfig } from '../shared/types';
import { computeExitCode } from '../layers/L2-reporter';

/**
 * Per-invocation state: the resolved configuration and the running counts.
 * Only the pipeline mutates it, one unit at a time.
 */
export class AuditSession {
  readonly counts: AuditCounts = {
    filesProcessed: 0,
    functionsProcessed: 0,
    errors: 0,
    warnings: 0,
    unresolved: 0,
    parseFailures: 0,
    fixesApplied: 0,
    fixFailures: 0,
    transportFailure: false,
  };

  constructor(readonly config: ResolvedConfig) {}

  recordFile(): void {
    this.counts.filesProcessed++;
  }

  recordCritique(critique: Critique): void {
    this.counts.functionsProcessed++;
    for (const finding of critique.findings) {
      if (finding.severity === 'error') this.counts.errors++;
      else this.counts.warnings++;
    }
  }

  recordUnresolved(): void {
    this.counts.functionsProcessed++;
    this.counts.unresolved++;
  }

  recordParseFailure(): void {
    this.counts.parseFailures++;
  }

  recordFixes(applied: number, failed: number): void {
    this.counts.fixesApplied += applied;
    this.counts.fixFailures += failed;
  }

  recordTransportFailure(): void {
    this.counts.transportFailure = true;
  }

  exitCode(): number {
    return computeExitCode(this.counts, { errorOnWarnings: this.config.errorOnWarnings });
  }
}
