import { performance } from 'node:perf_hooks';

import { runTaskQueue } from '@partkit/core/concurrency';
import { noopLogger, type StructuredLogger } from '@partkit/core/logging';
import { InMemoryDomainEventBus, type AssemblyStage } from '@partkit/core/runtime';
import type { TelemetrySpan } from '@partkit/core/telemetry';

import type { AssemblyManifest, PartDeclaration } from '../config/index.js';
import { ManifestError } from '../domain/errors.js';
import { createOutputTree, type MergedTree, type OutputTree } from '../domain/model/index.js';
import type {
  DomainEventBusPort,
  MaterializedBundle,
  PartOutputRepositoryPort,
  TreeMaterializerPort,
} from '../domain/ports/index.js';
import {
  linkApps,
  mergePartOutputs,
  resolvePartOutput,
  type ConflictRecord,
  type LinkedApp,
  type LinkOptions,
  type MergeOptions,
  type ResolvedPartOutput,
} from '../domain/services/index.js';

export interface AssemblyRuntimeOptions {
  readonly repository: PartOutputRepositoryPort;
  readonly eventBus?: DomainEventBusPort;
  readonly logger?: StructuredLogger;
  /** Upper bound on parts loaded and resolved at the same time. */
  readonly concurrency?: number;
  readonly merge?: MergeOptions;
  readonly link?: LinkOptions;
  /** When present, the assembled tree is written out after linking. */
  readonly materializer?: TreeMaterializerPort;
}

export interface AssembleOptions {
  /** Parent span receiving one child span per stage. */
  readonly span?: TelemetrySpan;
}

export interface PartResolution extends ResolvedPartOutput {
  readonly durationMs: number;
}

export interface AssemblyTimings {
  readonly loadingMs: number;
  readonly resolutionMs: number;
  readonly mergeMs: number;
  readonly linkingMs: number;
  readonly materializationMs?: number;
  readonly totalMs: number;
}

export interface AssemblyResult {
  readonly manifest: AssemblyManifest;
  readonly parts: readonly PartResolution[];
  readonly tree: MergedTree;
  readonly conflicts: readonly ConflictRecord[];
  readonly apps: readonly LinkedApp[];
  readonly timings: AssemblyTimings;
  readonly concurrency: number;
  readonly bundle?: MaterializedBundle;
}

interface StageOutcome<T> {
  readonly value: T;
  readonly durationMs: number;
}

/**
 * Drives an assembly run: part outputs are loaded and resolved through the bounded task queue,
 * merged in declared order, linked against the declared apps and optionally materialized. Each
 * stage publishes start, complete and error events on the domain event bus.
 */
export class AssemblyRuntime {
  private readonly repository: PartOutputRepositoryPort;
  private readonly eventBus: DomainEventBusPort;
  private readonly logger: StructuredLogger;
  private readonly concurrency: number | undefined;
  private readonly mergeOptions: MergeOptions;
  private readonly linkOptions: LinkOptions;
  private readonly materializer: TreeMaterializerPort | undefined;

  constructor(options: AssemblyRuntimeOptions) {
    this.repository = options.repository;
    this.eventBus = options.eventBus ?? new InMemoryDomainEventBus();
    this.logger = options.logger ?? noopLogger;
    this.concurrency = options.concurrency;
    this.mergeOptions = options.merge ?? {};
    this.linkOptions = options.link ?? {};
    this.materializer = options.materializer;
  }

  async assemble(
    manifest: AssemblyManifest,
    options: AssembleOptions = {},
  ): Promise<AssemblyResult> {
    const startedAt = performance.now();
    const { span } = options;

    const loading = await this.runStage(
      'loading',
      span,
      () => this.loadOutputs(manifest.parts),
      (outcome) => ({ partCount: outcome.trees.length, concurrency: outcome.concurrency }),
    );

    const resolution = await this.runStage(
      'resolution',
      span,
      () => this.resolveOutputs(manifest.parts, loading.value.trees),
      (parts) => ({
        partCount: parts.length,
        stagedCount: parts.reduce((count, part) => count + part.files.length, 0),
        excludedCount: parts.reduce((count, part) => count + part.excludedCount, 0),
      }),
    );

    const merge = await this.runStage(
      'merge',
      span,
      () => mergePartOutputs(resolution.value, this.mergeOptions),
      (result) => ({ fileCount: result.tree.size, conflictCount: result.conflicts.length }),
    );

    const linking = await this.runStage(
      'linking',
      span,
      () => linkApps(merge.value.tree, manifest.apps, this.linkOptions),
      (apps) => ({ appCount: apps.length }),
    );

    const materialization = this.materializer
      ? await this.runStage(
          'materialization',
          span,
          () => this.materialize(merge.value.tree, linking.value),
          (bundle) => ({ fileCount: bundle.fileCount, directory: bundle.directory }),
        )
      : undefined;

    const timings: AssemblyTimings = {
      loadingMs: loading.durationMs,
      resolutionMs: resolution.durationMs,
      mergeMs: merge.durationMs,
      linkingMs: linking.durationMs,
      ...(materialization ? { materializationMs: materialization.durationMs } : {}),
      totalMs: performance.now() - startedAt,
    };

    this.logger.log({
      level: 'debug',
      name: 'partkit-assembly',
      event: 'assembly.timings',
      elapsedMs: timings.totalMs,
      data: { ...timings },
    });

    return {
      manifest,
      parts: resolution.value,
      tree: merge.value.tree,
      conflicts: merge.value.conflicts,
      apps: linking.value,
      timings,
      concurrency: loading.value.concurrency,
      ...(materialization ? { bundle: materialization.value } : {}),
    } satisfies AssemblyResult;
  }

  /**
   * Loads and resolves the named parts (all parts when none are named) without merging them.
   */
  async inspect(
    manifest: AssemblyManifest,
    partNames: readonly string[] = [],
  ): Promise<readonly PartResolution[]> {
    const unknown = partNames.filter((name) => !manifest.parts.some((part) => part.name === name));
    if (unknown.length > 0) {
      throw new ManifestError(
        `Unknown part(s): ${unknown.join(', ')}.`,
        unknown.map((name) => ({ path: `parts.${name}`, message: 'Part is not declared.' })),
      );
    }
    const parts =
      partNames.length === 0
        ? manifest.parts
        : manifest.parts.filter((part) => partNames.includes(part.name));
    const loaded = await this.loadOutputs(parts);
    return this.resolveOutputs(parts, loaded.trees);
  }

  private async loadOutputs(
    parts: readonly PartDeclaration[],
  ): Promise<{ readonly trees: readonly OutputTree[]; readonly concurrency: number }> {
    const outcome = await runTaskQueue(
      parts.map((part) => ({ id: part.name, run: () => this.repository.load(part) })),
      this.queueOptions(),
    );
    return {
      trees: outcome.results.map((result) => result.value),
      concurrency: outcome.metrics.concurrency,
    };
  }

  private async resolveOutputs(
    parts: readonly PartDeclaration[],
    trees: readonly OutputTree[],
  ): Promise<readonly PartResolution[]> {
    const outcome = await runTaskQueue(
      parts.map((part, index) => ({
        id: part.name,
        run: () => resolvePartOutput(part, trees[index] ?? createOutputTree([])),
      })),
      {
        ...this.queueOptions(),
        onTaskComplete: (result) => {
          this.logger.log({
            level: 'debug',
            name: 'partkit-assembly',
            event: 'assembly.part.resolved',
            elapsedMs: result.durationMs,
            data: {
              part: result.id,
              stagedCount: result.value.files.length,
              excludedCount: result.value.excludedCount,
              unmatchedRuleCount: result.value.unmatchedRules.length,
            },
          });
        },
      },
    );
    return outcome.results.map((result) => ({ ...result.value, durationMs: result.durationMs }));
  }

  private async materialize(
    tree: MergedTree,
    apps: readonly LinkedApp[],
  ): Promise<MaterializedBundle> {
    if (!this.materializer) {
      throw new Error('No tree materializer configured.');
    }
    return this.materializer.materialize(tree, apps);
  }

  private queueOptions(): { readonly concurrency?: number } {
    return this.concurrency === undefined ? {} : { concurrency: this.concurrency };
  }

  private async runStage<T>(
    stage: AssemblyStage,
    parentSpan: TelemetrySpan | undefined,
    work: () => Promise<T> | T,
    describe: (value: T) => Readonly<Record<string, string | number | boolean>>,
  ): Promise<StageOutcome<T>> {
    const span = parentSpan?.startChild(`partkit.assembly.${stage}`);
    await this.eventBus.publish({
      type: 'stage:start',
      payload: { stage, timestamp: new Date() },
    });

    const startedAt = performance.now();
    try {
      const value = await work();
      const durationMs = performance.now() - startedAt;
      const attributes = { durationMs, ...describe(value) };
      span?.end({ attributes, status: 'ok' });
      await this.eventBus.publish({
        type: 'stage:complete',
        payload: { stage, timestamp: new Date(), attributes },
      });
      return { value, durationMs };
    } catch (error) {
      span?.end({ status: 'error' });
      await this.eventBus.publish({
        type: 'stage:error',
        payload: { stage, timestamp: new Date(), error },
      });
      throw error;
    }
  }
}
