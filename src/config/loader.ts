import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { auditorConfigSchema } from './schema';
import type { AuditorConfig, ResolvedConfig } from '../shared/types';

export const DEFAULT_CONFIG_FILE = '.docstring-auditor.yml';

export interface ConfigWarning {
  field: string;
  message: string;
}

export interface LoadConfigResult {
  config: AuditorConfig;
  warnings: ConfigWarning[];
}

/** Values used when neither the config file nor a CLI flag sets a field. */
export const CONFIG_DEFAULTS: ResolvedConfig = {
  ignoreDirs: ['tests'],
  errorOnWarnings: false,
  model: 'gpt-4',
  codeBlockName: '',
  autoFix: false,
  includeClasses: false,
  docstringStyle: 'numpydoc',
  llm: {
    temperature: 0.1,
    maxTokens: 2048,
    maxRetries: 3,
    retryBaseDelayMs: 1000,
  },
};

/**
 * Load and validate a .docstring-auditor.yml file.
 *
 * - Missing or empty file → {}
 * - Invalid YAML → E501 warning + {}
 * - Unknown keys → E502 warning with "did you mean?", key dropped
 * - Invalid values → E502 warning, only that field dropped (default applies)
 */
export function loadAuditorConfig(filePath: string = DEFAULT_CONFIG_FILE): LoadConfigResult {
  const warnings: ConfigWarning[] = [];

  let rawContent: string;
  try {
    rawContent = fs.readFileSync(filePath, 'utf-8');
  } catch {
    return { config: {}, warnings };
  }

  if (rawContent.trim() === '') {
    return { config: {}, warnings };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(rawContent);
  } catch (err) {
    warnings.push({
      field: '_yaml',
      message: `E501: Invalid YAML syntax: ${err instanceof Error ? err.message : 'Unknown error'}. Using defaults.`,
    });
    return { config: {}, warnings };
  }

  // YAML holding only comments parses to null
  if (parsed === null || parsed === undefined) {
    return { config: {}, warnings };
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    warnings.push({
      field: '_yaml',
      message: 'E501: Config must be a YAML mapping. Using defaults.',
    });
    return { config: {}, warnings };
  }

  const result = auditorConfigSchema.safeParse(parsed);
  if (result.success) {
    return { config: result.data, warnings };
  }

  const dropped: string[][] = [];
  for (const issue of result.error.issues) {
    const issuePath = issue.path.map(String);
    const fieldPath = issuePath.join('.');
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        const suggestion = findSimilarKey(key, issuePath.length > 0 ? LLM_KEYS : KNOWN_KEYS);
        const msg = suggestion
          ? `E502: Unknown key "${key}". Did you mean "${suggestion}"?`
          : `E502: Unknown key "${key}".`;
        warnings.push({ field: fieldPath ? `${fieldPath}.${key}` : key, message: msg });
        dropped.push([...issuePath, key]);
      }
    } else {
      warnings.push({
        field: fieldPath || '_unknown',
        message: `E502: ${issue.message}. Using default for this field.`,
      });
      if (issuePath.length > 0) dropped.push(issuePath);
    }
  }

  const retained = withoutPaths(parsed, dropped);
  const retry = auditorConfigSchema.safeParse(retained);
  return { config: retry.success ? retry.data : {}, warnings };
}

/** CLI flags that override file values; undefined means "not given". */
export interface ConfigOverrides {
  ignoreDirs?: string[];
  errorOnWarnings?: boolean;
  model?: string;
  codeBlockName?: string;
  autoFix?: boolean;
  includeClasses?: boolean;
  docstringStyle?: string;
}

export function resolveConfig(file: AuditorConfig, overrides: ConfigOverrides = {}): ResolvedConfig {
  const d = CONFIG_DEFAULTS;
  return {
    ignoreDirs: overrides.ignoreDirs ?? file.ignore_dirs ?? d.ignoreDirs,
    errorOnWarnings: overrides.errorOnWarnings ?? file.error_on_warnings ?? d.errorOnWarnings,
    model: overrides.model ?? file.model ?? d.model,
    codeBlockName: overrides.codeBlockName ?? file.code_block_name ?? d.codeBlockName,
    autoFix: overrides.autoFix ?? file.auto_fix ?? d.autoFix,
    includeClasses: overrides.includeClasses ?? file.include_classes ?? d.includeClasses,
    docstringStyle: overrides.docstringStyle ?? file.docstring_style ?? d.docstringStyle,
    llm: {
      temperature: file.llm?.temperature ?? d.llm.temperature,
      maxTokens: file.llm?.max_tokens ?? d.llm.maxTokens,
      maxRetries: file.llm?.max_retries ?? d.llm.maxRetries,
      retryBaseDelayMs: file.llm?.retry_base_delay_ms ?? d.llm.retryBaseDelayMs,
    },
  };
}

/** Known top-level keys for "did you mean?" suggestions. */
const KNOWN_KEYS = [
  'ignore_dirs',
  'error_on_warnings',
  'model',
  'code_block_name',
  'auto_fix',
  'include_classes',
  'docstring_style',
  'llm',
];

/** Keys of the nested `llm` block. */
const LLM_KEYS = ['temperature', 'max_tokens', 'max_retries', 'retry_base_delay_ms'];

function isMapping(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy of `value` without the given key paths. A field with a rejected path
 * below it that is not itself a mapping (a list item, say) is dropped whole.
 */
function withoutPaths(value: object, paths: string[][]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    const below = paths.filter((p) => p[0] === key);
    if (below.length === 0) {
      out[key] = child;
    } else if (!below.some((p) => p.length === 1) && isMapping(child)) {
      out[key] = withoutPaths(child, below.map((p) => p.slice(1)));
    }
  }
  return out;
}

function findSimilarKey(key: string, candidates: readonly string[]): string | null {
  const lower = key.toLowerCase();
  for (const known of candidates) {
    if (levenshtein(lower, known) <= 3) {
      return known;
    }
  }
  return null;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] =
        a[i - 1] === b[j - 1]
          ? dp[i - 1][j - 1]
          : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}
