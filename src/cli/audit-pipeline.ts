/**
 * Audit pipeline: extract → prompt → complete → parse → render, per unit,
 * with docstring fixes collected per file and written once at the end.
 */

import fs from 'fs';
import { extractFunctionUnits, type FunctionUnitSequence } from '../layers/L0-unit-extractor';
import { buildAuditPrompt, parseCritique } from '../layers/L1-critique';
import {
  renderCritique,
  renderFileHeader,
  renderFixApplied,
  renderFixFailure,
  renderParseFailure,
  renderUnresolved,
} from '../layers/L2-reporter';
import { applyEdits, planFix, writeFileAtomic, type TextEdit } from '../layers/L3-autofix';
import { ApplyFixError, MalformedResponseError, ParseError, TransportError } from '../shared/types';
import type { Critique, FunctionUnit } from '../shared/types';
import { createLogger } from '../shared/logger';
import { collectSourceFiles } from './file-walker';
import type { LLMClient } from './llm-client';
import type { AuditSession } from './session';

const log = createLogger({ module: 'audit-pipeline' });

export interface AuditPipelineOptions {
  client: LLMClient;
  session: AuditSession;
  write?: (msg: string) => void;
}

export class AuditPipeline {
  private readonly client: LLMClient;
  private readonly session: AuditSession;
  private readonly write: (msg: string) => void;

  constructor(options: AuditPipelineOptions) {
    this.client = options.client;
    this.session = options.session;
    this.write = options.write ?? console.log;
  }

  /** Audit one file or every source file under a directory. */
  async auditPath(target: string): Promise<void> {
    const files = collectSourceFiles(target, this.session.config.ignoreDirs);
    for (const file of files) {
      await this.auditFile(file);
      if (this.session.counts.transportFailure) {
        log.error({ file }, 'Completion service unavailable; aborting run');
        break;
      }
    }
  }

  async auditFile(filePath: string): Promise<void> {
    const { config } = this.session;
    log.debug({ file: filePath }, 'Auditing file');

    let source: string;
    let sequence: FunctionUnitSequence;
    try {
      source = fs.readFileSync(filePath, 'utf-8');
      sequence = await extractFunctionUnits(source, {
        codeBlockName: config.codeBlockName,
        includeClasses: config.includeClasses,
      });
    } catch (err) {
      if (!(err instanceof ParseError) && !isFsError(err)) throw err;
      log.error({ file: filePath, err }, 'Skipping file that could not be parsed');
      this.write(renderParseFailure(filePath, err));
      this.session.recordParseFailure();
      return;
    }

    this.session.recordFile();
    const units = sequence.toArray();
    this.write(renderFileHeader(filePath, units.length));

    const edits: TextEdit[] = [];
    let planFailures = 0;

    for (const unit of units) {
      const critique = await this.auditUnit(unit);
      if (this.session.counts.transportFailure) break;
      if (!critique || !config.autoFix) continue;

      try {
        const edit = planFix(source, unit, critique);
        if (edit) edits.push(edit);
      } catch (err) {
        if (!(err instanceof ApplyFixError)) throw err;
        this.write(renderFixFailure(unit.name, err.message));
        planFailures++;
      }
    }

    this.writeFixes(filePath, source, edits, planFailures);
  }

  /** Returns null when the unit could not be audited. */
  private async auditUnit(unit: FunctionUnit): Promise<Critique | null> {
    const { config } = this.session;
    const prompt = buildAuditPrompt(unit, { docstringStyle: config.docstringStyle });

    let raw: string;
    try {
      log.debug({ unit: unit.name, line: unit.line }, 'Submitting unit');
      const response = await this.client.complete(prompt.system, prompt.user, {
        model: config.model,
        temperature: config.llm.temperature,
        maxTokens: config.llm.maxTokens,
      });
      raw = response.content;
    } catch (err) {
      if (!(err instanceof TransportError)) throw err;
      log.error({ unit: unit.name, status: err.status, err }, 'Completion request failed');
      this.write(renderUnresolved(unit.name, err.message));
      this.session.recordTransportFailure();
      return null;
    }

    try {
      const critique = parseCritique(raw);
      this.write(renderCritique(unit.name, critique));
      this.session.recordCritique(critique);
      return critique;
    } catch (err) {
      if (!(err instanceof MalformedResponseError)) throw err;
      log.warn({ unit: unit.name, err }, 'Malformed completion');
      this.write(renderUnresolved(unit.name, err.message));
      this.session.recordUnresolved();
      return null;
    }
  }

  private writeFixes(filePath: string, source: string, edits: TextEdit[], planFailures: number): void {
    if (edits.length === 0) {
      this.session.recordFixes(0, planFailures);
      return;
    }

    const result = applyEdits(source, edits);
    for (const edit of result.skipped) {
      this.write(renderFixFailure(edit.unitName, 'overlaps another fix in this file'));
    }

    const failures = planFailures + result.skipped.length;
    if (result.applied.length === 0) {
      this.session.recordFixes(0, failures);
      return;
    }

    try {
      writeFileAtomic(filePath, result.text);
    } catch (err) {
      if (!isFsError(err)) throw err;
      log.error({ file: filePath, err }, 'Could not write docstring fixes');
      for (const edit of result.applied) {
        this.write(renderFixFailure(edit.unitName, `could not write ${filePath}: ${err.message}`));
      }
      this.session.recordFixes(0, failures + result.applied.length);
      return;
    }

    log.info({ file: filePath, fixes: result.applied.length }, 'Docstring fixes written');
    this.write(renderFixApplied(filePath, result.applied.length));
    this.session.recordFixes(result.applied.length, failures);
  }
}

function isFsError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && 'syscall' in err;
}
