import path from 'node:path';

import type { StructuredLogger } from '@partkit/core/logging';
import {
  escapeMarkdown,
  formatCount,
  formatDurationMs,
  formatUnknownError,
  serialiseError,
  writeJson,
  writeLine,
  type WritableTarget,
} from '@partkit/core/reporting';

import type { AssemblyManifest } from '../config/index.js';
import type {
  AssemblyResult,
  AssemblyTimings,
  PartResolution,
} from '../application/assembly-runtime.js';
import type { ManifestValidationSummary } from '../application/manifest-validation.js';
import { isAssemblyError, ManifestError } from '../domain/errors.js';
import type { ConflictRecord, UnmatchedRule } from '../domain/services/index.js';

export { formatDurationMs } from '@partkit/core/reporting';

/**
 * Output formats supported by the CLI reporter.
 */
export type ReporterFormat = 'human' | 'json' | 'markdown';

export type ReportedOperation = 'assemble' | 'validate' | 'inspect';

interface ReporterOptions {
  readonly format: ReporterFormat;
  readonly logger: StructuredLogger;
  readonly stdout?: WritableTarget;
  readonly stderr?: WritableTarget;
  readonly cwd?: string;
  readonly includeTimings?: boolean;
}

export interface ValidateReportContext {
  readonly manifestPath: string;
  readonly manifest: AssemblyManifest;
  readonly summary: ManifestValidationSummary;
}

/**
 * Reporting surface consumed by CLI commands to surface results and failures.
 */
export interface Reporter {
  readonly format: ReporterFormat;
  validateSuccess(context: ValidateReportContext): void;
  assembleSuccess(result: AssemblyResult): void;
  inspectSuccess(parts: readonly PartResolution[]): void;
  failure(operation: ReportedOperation, error: unknown): void;
}

interface ReporterContext {
  readonly stdout: WritableTarget;
  readonly stderr: WritableTarget;
  readonly cwd: string;
  readonly logger: StructuredLogger;
  readonly includeTimings: boolean;
}

const LOG_SCOPE = 'partkit-assembly';

/**
 * Creates a reporter instance for the requested format.
 *
 * @param options - Reporter configuration including IO targets and logger.
 * @returns Reporter implementation for the selected format.
 */
export function createReporter(options: ReporterOptions): Reporter {
  const context: ReporterContext = {
    stdout: options.stdout ?? process.stdout,
    stderr: options.stderr ?? process.stderr,
    cwd: options.cwd ?? process.cwd(),
    logger: options.logger,
    includeTimings: options.includeTimings ?? false,
  };

  const reporterFactories: Record<ReporterFormat, (context: ReporterContext) => Reporter> = {
    json: createJsonReporter,
    markdown: (reporterContext) => createTextReporter('markdown', reporterContext),
    human: (reporterContext) => createTextReporter('human', reporterContext),
  };

  return reporterFactories[options.format](context);
}

function createJsonReporter(context: ReporterContext): Reporter {
  return {
    format: 'json',
    validateSuccess({ manifestPath, manifest, summary }) {
      writeJson(context.stdout, {
        event: 'validate.completed',
        status: 'ok' as const,
        manifest: {
          name: manifest.name,
          path: path.relative(context.cwd, manifestPath),
        },
        summary,
      });
      logValidateSummary(context.logger, manifest, summary);
    },
    assembleSuccess(result) {
      writeJson(context.stdout, {
        event: 'assemble.completed',
        status: 'ok' as const,
        manifest: result.manifest.name,
        fileCount: result.tree.size,
        parts: result.parts.map((part) => ({
          name: part.part,
          stagedCount: part.files.length,
          excludedCount: part.excludedCount,
          organizedCount: part.organizedCount,
          unmatchedRules: part.unmatchedRules,
        })),
        conflicts: result.conflicts,
        apps: result.apps,
        ...(result.bundle
          ? {
              bundle: {
                directory: path.relative(context.cwd, result.bundle.directory),
                fileCount: result.bundle.fileCount,
              },
            }
          : {}),
        ...(context.includeTimings ? { timings: result.timings } : {}),
      });
      logAssembleSummary(context.logger, result);
    },
    inspectSuccess(parts) {
      writeJson(context.stdout, {
        event: 'inspect.completed',
        status: 'ok' as const,
        parts: parts.map((part) => ({
          name: part.part,
          files: part.files.map((file) => ({ path: file.path, sourcePath: file.sourcePath })),
          excludedCount: part.excludedCount,
          unmatchedRules: part.unmatchedRules,
        })),
      });
    },
    failure(operation, error) {
      const serialised = serialiseError(error);
      writeJson(context.stderr, {
        event: `${operation}.failed`,
        status: 'error' as const,
        error: {
          name: serialised.name,
          message: serialised.message,
          ...(serialised.code === undefined ? {} : { code: serialised.code }),
          ...(serialised.details === undefined ? {} : { details: serialised.details }),
        },
      });
      logFailure(context.logger, operation, error);
    },
  } satisfies Reporter;
}

/**
 * Creates a text-based reporter used for both human and markdown outputs.
 */
function createTextReporter(format: 'human' | 'markdown', context: ReporterContext): Reporter {
  const code = (value: string): string => (format === 'markdown' ? `\`${value}\`` : value);
  const text = (value: string): string => (format === 'markdown' ? escapeMarkdown(value) : value);
  const bullet = format === 'markdown' ? '-' : '  -';

  return {
    format,
    validateSuccess({ manifest, summary }) {
      logValidateSummary(context.logger, manifest, summary);
      writeLine(
        context.stdout,
        `Manifest ${text(manifest.name)} is valid: ${formatCount(summary.partCount, 'part')}, ${formatCount(summary.ruleCount, 'rule')}, ${formatCount(summary.appCount, 'app')}.`,
      );
    },
    assembleSuccess(result) {
      logAssembleSummary(context.logger, result);
      if (format === 'markdown') {
        writeLine(context.stdout, `## ${escapeMarkdown(result.manifest.name)}`);
        writeLine(context.stdout, '');
      }
      writeLine(
        context.stdout,
        `Assembled ${formatCount(result.tree.size, 'file')} from ${formatCount(result.parts.length, 'part')} in ${formatDurationMs(result.timings.totalMs)}.`,
      );

      if (result.apps.length > 0) {
        writeLine(
          context.stdout,
          `Linked ${formatCount(result.apps.length, 'app')}: ${result.apps.map((app) => code(app.name)).join(', ')}.`,
        );
      }

      if (result.conflicts.length === 0) {
        writeLine(context.stdout, 'No conflicts.');
      } else {
        writeLine(context.stdout, `${formatCount(result.conflicts.length, 'conflict')}:`);
        for (const conflict of result.conflicts) {
          writeLine(context.stdout, `${bullet} ${describeConflict(conflict, code)}`);
        }
      }

      for (const part of result.parts) {
        if (part.unmatchedRules.length > 0) {
          writeLine(
            context.stdout,
            `Unmatched rules in ${code(part.part)}: ${part.unmatchedRules.map((rule) => describeUnmatched(rule, code)).join(', ')}.`,
          );
        }
      }

      if (result.bundle) {
        writeLine(
          context.stdout,
          `Wrote bundle to ${code(path.relative(context.cwd, result.bundle.directory) || '.')}.`,
        );
      }

      if (context.includeTimings) {
        writeLine(context.stdout, formatTimingSummary(result.timings));
      }
    },
    inspectSuccess(parts) {
      for (const part of parts) {
        writeLine(
          context.stdout,
          `${format === 'markdown' ? '### ' : ''}${text(part.part)}: ${formatCount(part.files.length, 'staged file')}, ${part.excludedCount.toString(10)} excluded`,
        );
        for (const file of part.files) {
          const origin = file.sourcePath === file.path ? '' : ` (from ${code(file.sourcePath)})`;
          writeLine(context.stdout, `${bullet} ${code(file.path)}${origin}`);
        }
      }
    },
    failure(operation, error) {
      logFailure(context.logger, operation, error);
      writeLine(context.stderr, `${capitalise(operation)} failed: ${formatUnknownError(error)}`);
      if (error instanceof ManifestError) {
        for (const issue of error.issues) {
          writeLine(context.stderr, `${bullet} ${code(issue.path)}: ${issue.message}`);
        }
      }
    },
  } satisfies Reporter;
}

function describeConflict(conflict: ConflictRecord, code: (value: string) => string): string {
  const loser = `${conflict.loser.part} (${code(conflict.loser.sourcePath)})`;
  const note = conflict.acknowledged ? ' [acknowledged]' : '';
  if (conflict.kind === 'file-directory') {
    const winner = `${conflict.winner.part} (${code(conflict.winner.path)})`;
    return `${code(conflict.path)}: ${winner} displaced ${loser}${note}`;
  }
  const winner = `${conflict.winner.part} (${code(conflict.winner.sourcePath)})`;
  return `${code(conflict.path)}: ${winner} overwrote ${loser}${note}`;
}

function describeUnmatched(rule: UnmatchedRule, code: (value: string) => string): string {
  return `${rule.type} ${code(rule.pattern)}`;
}

function formatTimingSummary(timings: AssemblyTimings): string {
  const stages = [
    `loading ${formatDurationMs(timings.loadingMs)}`,
    `resolution ${formatDurationMs(timings.resolutionMs)}`,
    `merge ${formatDurationMs(timings.mergeMs)}`,
    `linking ${formatDurationMs(timings.linkingMs)}`,
    ...(timings.materializationMs === undefined
      ? []
      : [`materialization ${formatDurationMs(timings.materializationMs)}`]),
  ];
  return `Timings: ${stages.join(', ')} (total ${formatDurationMs(timings.totalMs)})`;
}

function capitalise(value: string): string {
  return `${value.charAt(0).toUpperCase()}${value.slice(1)}`;
}

function logValidateSummary(
  logger: StructuredLogger,
  manifest: AssemblyManifest,
  summary: ManifestValidationSummary,
): void {
  logger.log({
    level: 'info',
    name: LOG_SCOPE,
    event: 'validate.completed',
    data: { manifest: manifest.name, ...summary },
  });
}

function logAssembleSummary(logger: StructuredLogger, result: AssemblyResult): void {
  logger.log({
    level: 'info',
    name: LOG_SCOPE,
    event: 'assembly.completed',
    elapsedMs: result.timings.totalMs,
    data: {
      manifest: result.manifest.name,
      fileCount: result.tree.size,
      partCount: result.parts.length,
      appCount: result.apps.length,
      conflictCount: result.conflicts.length,
      concurrency: result.concurrency,
    },
  });
}

function logFailure(logger: StructuredLogger, operation: ReportedOperation, error: unknown): void {
  logger.log({
    level: 'error',
    name: LOG_SCOPE,
    event: operation === 'assemble' ? 'assembly.failed' : `${operation}.failed`,
    data: {
      message: error instanceof Error ? error.message : String(error),
      ...(isAssemblyError(error) ? { code: error.code, details: error.details } : {}),
    },
  });
}
