/**
 * docstring-auditor CLI entry point.
 *
 * Usage:
 *   docstring-auditor [path] [--auto-fix] [--model=NAME] ...
 */

import fs from 'fs';
import { loadAuditorConfig, resolveConfig, DEFAULT_CONFIG_FILE } from '../config';
import type { ConfigOverrides } from '../config';
import { renderSummary, EXIT_FATAL, EXIT_OK } from '../layers/L2-reporter';
import { ConfigurationError } from '../shared/types';
import { AuditPipeline } from './audit-pipeline';
import { getHelp } from './help';
import { createCompletionClient, withRetry, type LLMClient } from './llm-client';
import { color } from './output';
import { AuditSession } from './session';

export interface CliArgs {
  args: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

const BOOLEAN_FLAGS = ['help', 'auto-fix', 'error-on-warnings', 'include-classes'];

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};

  const setOption = (key: string, value: string): void => {
    // Repeated options accumulate as a comma-separated list
    options[key] = key in options ? `${options[key]},${value}` : value;
  };

  // Skip node and script path
  const args = argv.slice(2);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eqIdx = arg.indexOf('=');
      if (eqIdx !== -1) {
        // --key=value
        setOption(arg.slice(2, eqIdx), arg.slice(eqIdx + 1));
      } else if (i + 1 < args.length && !args[i + 1].startsWith('-')) {
        // --key value, unless the next arg is a flag
        const key = arg.slice(2);
        if (BOOLEAN_FLAGS.includes(key)) {
          flags[key] = true;
        } else {
          setOption(key, args[++i]);
        }
      } else {
        flags[arg.slice(2)] = true;
      }
    } else if (arg.startsWith('-')) {
      flags[arg.slice(1)] = true;
    } else {
      positional.push(arg);
    }
  }

  return { args: positional, flags, options };
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

export function toOverrides({ flags, options }: CliArgs): ConfigOverrides {
  return {
    ignoreDirs: splitList(options['ignore-dirs']),
    model: options.model,
    codeBlockName: options['code-block-name'],
    docstringStyle: options['docstring-style'],
    autoFix: flags['auto-fix'] ? true : undefined,
    errorOnWarnings: flags['error-on-warnings'] ? true : undefined,
    includeClasses: flags['include-classes'] ? true : undefined,
  };
}

export interface RunDeps {
  write?: (msg: string) => void;
  /** Builds the provider client for a model; defaults to env-based selection. */
  createClient?: (model: string) => LLMClient;
}

export async function run(argv: string[] = process.argv, deps: RunDeps = {}): Promise<number> {
  const write = deps.write ?? console.log;
  const cli = parseArgs(argv);

  if (cli.flags.help || cli.flags.h) {
    write(getHelp());
    return EXIT_OK;
  }

  const { config: fileConfig, warnings } = loadAuditorConfig(cli.options.config ?? DEFAULT_CONFIG_FILE);
  for (const w of warnings) {
    write(color.yellow(`Warning: ${w.message}`));
  }
  const config = resolveConfig(fileConfig, toOverrides(cli));

  const target = cli.args[0] ?? '.';
  if (!fs.existsSync(target)) {
    write(color.red(`Error: path not found: ${target}`));
    return EXIT_FATAL;
  }

  let client: LLMClient;
  try {
    const base = (deps.createClient ?? createCompletionClient)(config.model);
    client = withRetry(base, {
      maxRetries: config.llm.maxRetries,
      baseDelayMs: config.llm.retryBaseDelayMs,
    });
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    write(color.red(`Error: ${err.message}`));
    return EXIT_FATAL;
  }

  const session = new AuditSession(config);
  const pipeline = new AuditPipeline({ client, session, write });
  await pipeline.auditPath(target);

  write(renderSummary(session.counts));
  return session.exitCode();
}
