import { inject, singleton } from 'tsyringe';
import type { Result } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { ILoggerFactory, Logger } from '../../core/logging/types.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { Protocol, StepKind } from '../../domain/protocol/steps.js';
import type { ProtocolError } from '../../domain/protocol/error.js';
import { withOverrides } from '../../domain/protocol/protocol.js';
import { assertNever } from '../../runtime/assert-never.js';
import { resolveTags } from './sequence/resolve-tags.js';
import { checkNesting } from './sequence/check-nesting.js';
import { buildLoopTree, unrolledLength, executedElementCount, type LoopTreeNode } from './sequence/loop-tree.js';
import { toSimulatorExperiment } from './exporters/simulator-experiment.js';
import { toOntologyJsonLd } from './exporters/ontology-jsonld.js';
import { toAutomationJson } from './exporters/automation-json.js';
import type { ExportFormat } from './exporters/index.js';

export interface ExportRequest {
  readonly format: ExportFormat;
  readonly sampleName?: string;
  readonly capacityMah?: number;
  /** Data directory written into the automation payload. */
  readonly outputPath?: string;
}

export interface ExportedDocument {
  readonly format: ExportFormat;
  /** Serialized document, ready to print or write. */
  readonly content: string;
}

export interface ProtocolSummary {
  readonly stepCount: number;
  readonly executableCount: number;
  readonly loopCount: number;
  readonly tagCount: number;
  readonly countsByKind: Readonly<Partial<Record<StepKind, number>>>;
  /** Deepest loop nesting; 0 when the protocol has no loops. */
  readonly maxNestingDepth: number;
  /** Executable steps one full run performs. */
  readonly unrolledLength: number;
  /** Configured ceiling for exporters that unroll (simulator). */
  readonly unrollCeiling: number;
  /** True when the simulator export would stop at the ceiling; other formats loop natively. */
  readonly exceedsUnrollCeiling: boolean;
}

/**
 * Orchestrates the protocol engine for callers outside the domain (the CLI,
 * library users going through the container).
 *
 * Owns the configured unroll ceiling and logs each export; the engine
 * functions underneath stay pure.
 */
@singleton()
export class ProtocolExportService {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
  ) {
    this.logger = loggerFactory.create('ProtocolExportService');
  }

  export(protocol: Protocol, request: ExportRequest): Result<ExportedDocument, ProtocolError> {
    this.logger.debug({ format: request.format, steps: protocol.method.length }, 'Exporting protocol');

    const result = this.render(protocol, request).map((content) => ({ format: request.format, content }));

    if (result.isErr()) {
      this.logger.warn({ format: request.format, error: result.error._tag }, result.error.message);
    } else {
      this.logger.info({ format: request.format, bytes: result.value.content.length }, 'Protocol exported');
    }
    return result;
  }

  /**
   * Runs every structural check and measures the protocol from its loop
   * tree. Nothing is unrolled, so a long protocol still summarizes; whether
   * it fits the unroll ceiling is reported, not enforced.
   */
  summarize(protocol: Protocol): Result<ProtocolSummary, ProtocolError> {
    const countsByKind: Partial<Record<StepKind, number>> = {};
    for (const step of protocol.method) {
      countsByKind[step.kind] = (countsByKind[step.kind] ?? 0) + 1;
    }
    const loopCount = countsByKind.loop ?? 0;
    const tagCount = countsByKind.tag ?? 0;

    const unrollCeiling = this.config.unroll.maxSteps;

    return resolveTags(protocol.method)
      .andThen(checkNesting)
      .map((steps) => {
        const tree = buildLoopTree(steps);
        return {
          stepCount: protocol.method.length,
          executableCount: protocol.method.length - loopCount - tagCount,
          loopCount,
          tagCount,
          countsByKind,
          maxNestingDepth: nestingDepth(tree),
          unrolledLength: unrolledLength(tree),
          unrollCeiling,
          exceedsUnrollCeiling: executedElementCount(tree) > unrollCeiling,
        };
      });
  }

  private render(protocol: Protocol, request: ExportRequest): Result<string, ProtocolError> {
    switch (request.format) {
      case 'simulator':
        return toSimulatorExperiment(withOverrides(protocol, request), {
          maxIterations: this.config.unroll.maxSteps,
        }).map((sentences) => JSON.stringify(sentences, null, 4));

      case 'ontology':
        return toOntologyJsonLd(protocol, { capacityMah: request.capacityMah, includeContext: true }).map((doc) =>
          JSON.stringify(doc, null, 4)
        );

      case 'automation':
        return toAutomationJson(protocol, request);

      default:
        return assertNever(request.format);
    }
  }
}

function nestingDepth(nodes: readonly LoopTreeNode[]): number {
  return nodes.reduce((deepest, node) => (node.kind === 'repeat' ? Math.max(deepest, 1 + nestingDepth(node.body)) : deepest), 0);
}
