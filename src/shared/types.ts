// === Source spans ===

/** Half-open [start, end) range of string indices into a source file. */
export interface Span {
  start: number;
  end: number;
}

export type SupportedLanguage = 'python';

export type ExtensionMap = Record<string, SupportedLanguage>;

export type UnitKind = 'function' | 'class';

/**
 * One auditable definition found in a source file.
 *
 * `docSpan` covers only the string literal; the indentation before it and the
 * newline after it belong to the surrounding text.
 */
export interface FunctionUnit {
  readonly name: string;
  readonly kind: UnitKind;
  /** 1-based line of the `def` / `class` keyword. */
  readonly line: number;
  readonly span: Span;
  readonly signatureSpan: Span;
  readonly docSpan?: Span;
  readonly bodySpan: Span;
  readonly bodyIndent: string;
  readonly bodyOnHeaderLine: boolean;
  readonly sourceText: string;
  readonly signatureText: string;
  readonly docText?: string;
}

// === Critiques ===

export type FindingSeverity = 'warning' | 'error';

export type Classification = 'ok' | FindingSeverity;

export interface Finding {
  readonly severity: FindingSeverity;
  readonly message: string;
}

export interface Critique {
  /** Function name echoed back by the model, if it sent one. */
  readonly functionName: string | null;
  readonly classification: Classification;
  readonly findings: readonly Finding[];
  readonly suggestedDoc: string | null;
  /** Only error-classified critiques with a suggestion may be auto-applied. */
  readonly fixable: boolean;
}

// === Session counters ===

export interface AuditCounts {
  filesProcessed: number;
  functionsProcessed: number;
  errors: number;
  warnings: number;
  unresolved: number;
  parseFailures: number;
  fixesApplied: number;
  fixFailures: number;
  transportFailure: boolean;
}

// === Error types ===

export interface ErrorContext {
  file?: string;
  unit?: string;
  line?: number;
  column?: number;
  status?: number;
}

export class AuditorError extends Error {
  readonly code: string;
  readonly context: ErrorContext;
  readonly cause?: Error;
  readonly retryable: boolean;

  constructor(opts: {
    code: string;
    message: string;
    context?: ErrorContext;
    cause?: Error;
    retryable?: boolean;
  }) {
    super(opts.message);
    this.name = 'AuditorError';
    this.code = opts.code;
    this.context = opts.context ?? {};
    this.cause = opts.cause;
    this.retryable = opts.retryable ?? false;
  }
}

/** Source text is not syntactically valid; aborts that file only. */
export class ParseError extends AuditorError {
  constructor(message: string, context: ErrorContext = {}) {
    super({ code: 'AUDITOR_E101', message, context });
    this.name = 'ParseError';
  }
}

export class TransportError extends AuditorError {
  readonly status?: number;
  /** Server-provided delay hint from a `retry-after` header. */
  readonly retryAfterMs?: number;

  constructor(opts: {
    message: string;
    status?: number;
    retryable: boolean;
    retryAfterMs?: number;
    cause?: Error;
  }) {
    super({
      code: 'AUDITOR_E201',
      message: opts.message,
      context: opts.status !== undefined ? { status: opts.status } : {},
      cause: opts.cause,
      retryable: opts.retryable,
    });
    this.name = 'TransportError';
    this.status = opts.status;
    this.retryAfterMs = opts.retryAfterMs;
  }
}

/** Completion text did not decode into the critique schema. */
export class MalformedResponseError extends AuditorError {
  readonly raw: string;

  constructor(message: string, raw: string, cause?: Error) {
    super({ code: 'AUDITOR_E202', message, cause });
    this.name = 'MalformedResponseError';
    this.raw = raw;
  }
}

export class ApplyFixError extends AuditorError {
  constructor(message: string, context: ErrorContext = {}) {
    super({ code: 'AUDITOR_E301', message, context });
    this.name = 'ApplyFixError';
  }
}

export class ConfigurationError extends AuditorError {
  constructor(message: string) {
    super({ code: 'AUDITOR_E401', message });
    this.name = 'ConfigurationError';
  }
}

// === Auditor config (.docstring-auditor.yml) ===

export interface AuditorConfig {
  ignore_dirs?: string[];
  error_on_warnings?: boolean;
  model?: string;
  code_block_name?: string;
  auto_fix?: boolean;
  include_classes?: boolean;
  docstring_style?: string;
  llm?: {
    temperature?: number;
    max_tokens?: number;
    max_retries?: number;
    retry_base_delay_ms?: number;
  };
}

/** Fully-resolved run configuration after file + CLI flags are merged. */
export interface ResolvedConfig {
  ignoreDirs: string[];
  errorOnWarnings: boolean;
  model: string;
  codeBlockName: string;
  autoFix: boolean;
  includeClasses: boolean;
  docstringStyle: string;
  llm: {
    temperature: number;
    maxTokens: number;
    maxRetries: number;
    retryBaseDelayMs: number;
  };
}
