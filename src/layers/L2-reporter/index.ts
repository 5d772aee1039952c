export {
  severityLabel,
  renderFileHeader,
  renderCritique,
  renderUnresolved,
  renderParseFailure,
  renderFixFailure,
  renderFixApplied,
  renderSummary,
} from './report';
export { computeExitCode, EXIT_OK, EXIT_FINDINGS, EXIT_FATAL } from './exit-status';
export type { ExitStatusOptions } from './exit-status';
