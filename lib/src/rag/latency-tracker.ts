/**
 * Latency Tracking for the Answer Pipeline
 *
 * Times the phases of one pipeline call (transcription, retrieval,
 * generation) and logs a summary. Phases slower than their threshold are
 * logged as warnings.
 *
 * @example
 * ```typescript
 * const tracker = new LatencyTracker('rag-123', { logger });
 *
 * const documents = await tracker.timePhase(RAGPhase.RETRIEVAL, () => retriever.search(question));
 * const answer = await tracker.timePhase(RAGPhase.GENERATION, () => composer.compose(question, documents, 'id'));
 *
 * const summary = tracker.complete();
 * // { requestId: 'rag-123', totalMs: 2140.5, phases: { retrieval: 40.1, generation: 2099.2 }, ... }
 * ```
 */

import { z } from 'zod';

import { type Logger, createSilentLogger } from '../logging/index.js';

// =============================================================================
// Types & Schemas
// =============================================================================

export const RAGPhase = {
  TRANSCRIPTION: 'transcription',
  RETRIEVAL: 'retrieval',
  GENERATION: 'generation',
} as const;

export type RAGPhase = (typeof RAGPhase)[keyof typeof RAGPhase];

export const PhaseTimingSchema = z.object({
  phase: z.string(),
  startMs: z.number(),
  /** Undefined while the phase is running */
  endMs: z.number().optional(),
  durationMs: z.number().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export type PhaseTiming = z.infer<typeof PhaseTimingSchema>;

export const LatencySummarySchema = z.object({
  requestId: z.string(),
  totalMs: z.number(),
  /** Duration of every phase started, in milliseconds */
  phases: z.record(z.number()),
  startedAt: z.date(),
  completedAt: z.date().optional(),
});

export type LatencySummary = z.infer<typeof LatencySummarySchema>;

export const LatencyThresholdsSchema = z.object({
  /** Warn if transcription takes longer than this (ms) */
  transcriptionWarnMs: z.number().positive().default(15000),
  /** Warn if retrieval takes longer than this (ms) */
  retrievalWarnMs: z.number().positive().default(1000),
  /** Warn if generation takes longer than this (ms); local models are slow */
  generationWarnMs: z.number().positive().default(30000),
  /** Warn if the whole call takes longer than this (ms) */
  totalWarnMs: z.number().positive().default(45000),
});

export type LatencyThresholds = z.infer<typeof LatencyThresholdsSchema>;
export type LatencyThresholdsInput = z.input<typeof LatencyThresholdsSchema>;

export interface LatencyTrackerOptions {
  logger?: Logger | undefined;
  thresholds?: LatencyThresholdsInput | undefined;
  /** Log the summary from `complete()` */
  logSummaryOnComplete?: boolean | undefined;
  /** Millisecond clock; `performance.now` unless a test pins it */
  clock?: (() => number) | undefined;
}

// =============================================================================
// LatencyTracker Class
// =============================================================================

export class LatencyTracker {
  private readonly requestId: string;
  private readonly logger: Logger;
  private readonly thresholds: LatencyThresholds;
  private readonly logSummaryOnComplete: boolean;
  private readonly clock: () => number;
  private readonly phases: Map<string, PhaseTiming> = new Map();
  private readonly startTime: number;
  private readonly startedAt: Date;
  private completedAt: Date | undefined;

  constructor(requestId: string, options: LatencyTrackerOptions = {}) {
    this.requestId = requestId;
    this.logger = options.logger ?? createSilentLogger();
    this.thresholds = LatencyThresholdsSchema.parse(options.thresholds ?? {});
    this.logSummaryOnComplete = options.logSummaryOnComplete ?? true;
    this.clock = options.clock ?? (() => performance.now());
    this.startTime = this.clock();
    this.startedAt = new Date();
  }

  startPhase(phase: string, metadata?: Record<string, unknown>): void {
    this.phases.set(phase, { phase, startMs: this.clock(), metadata });
    this.logger.trace(`Phase "${phase}" started`, {
      requestId: this.requestId,
      phase,
      ...metadata,
    });
  }

  /**
   * Stop a phase and return its duration; 0 for a phase never started.
   */
  endPhase(phase: string, metadata?: Record<string, unknown>): number {
    const timing = this.phases.get(phase);
    if (!timing) {
      this.logger.warn(`Attempted to end unknown phase: ${phase}`, {
        requestId: this.requestId,
        phase,
      });
      return 0;
    }

    timing.endMs = this.clock();
    timing.durationMs = timing.endMs - timing.startMs;
    if (metadata) {
      timing.metadata = { ...timing.metadata, ...metadata };
    }

    const context = {
      requestId: this.requestId,
      phase,
      durationMs: roundMs(timing.durationMs),
      ...timing.metadata,
    };
    const threshold = this.thresholdFor(phase);
    if (threshold !== undefined && timing.durationMs > threshold) {
      this.logger.warn(`Slow phase "${phase}"`, { ...context, thresholdMs: threshold });
    } else {
      this.logger.debug(`Phase "${phase}" completed`, context);
    }

    return timing.durationMs;
  }

  /**
   * Time an async phase; a failing phase is closed with `{ error: true }`
   * before the error propagates.
   */
  async timePhase<T>(
    phase: string,
    fn: () => Promise<T>,
    metadata?: Record<string, unknown>
  ): Promise<T> {
    this.startPhase(phase, metadata);
    try {
      const result = await fn();
      this.endPhase(phase);
      return result;
    } catch (error) {
      this.endPhase(phase, { error: true });
      throw error;
    }
  }

  getPhaseDuration(phase: string): number | undefined {
    return this.phases.get(phase)?.durationMs;
  }

  getElapsedMs(): number {
    return this.clock() - this.startTime;
  }

  getRequestId(): string {
    return this.requestId;
  }

  /**
   * Stop the clock and, unless disabled, log the summary.
   */
  complete(): LatencySummary {
    this.completedAt = new Date();
    const summary = this.getSummary();

    if (this.logSummaryOnComplete) {
      const context = {
        requestId: summary.requestId,
        totalMs: summary.totalMs,
        ...summary.phases,
      };
      const message = `Pipeline completed in ${summary.totalMs.toFixed(0)}ms`;
      if (summary.totalMs > this.thresholds.totalWarnMs) {
        this.logger.warn(message, { ...context, thresholdMs: this.thresholds.totalWarnMs });
      } else {
        this.logger.info(message, context);
      }
    }

    return summary;
  }

  /**
   * Current summary; running phases report their elapsed time so far.
   */
  getSummary(): LatencySummary {
    const now = this.clock();
    const phases: Record<string, number> = {};
    for (const [name, timing] of this.phases) {
      phases[name] = roundMs(timing.durationMs ?? now - timing.startMs);
    }

    return {
      requestId: this.requestId,
      totalMs: roundMs(now - this.startTime),
      phases,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
    };
  }

  private thresholdFor(phase: string): number | undefined {
    switch (phase) {
      case RAGPhase.TRANSCRIPTION:
        return this.thresholds.transcriptionWarnMs;
      case RAGPhase.RETRIEVAL:
        return this.thresholds.retrievalWarnMs;
      case RAGPhase.GENERATION:
        return this.thresholds.generationWarnMs;
      default:
        return undefined;
    }
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

function roundMs(ms: number): number {
  return Math.round(ms * 100) / 100;
}

/**
 * Multi-line rendering for the command-line tools
 *
 * @example
 * ```
 * Latency Summary for rag-123:
 *   Total: 2140.50ms
 *   retrieval: 40.10ms
 *   generation: 2099.20ms
 * ```
 */
export function formatLatencySummary(summary: LatencySummary): string {
  const lines: string[] = [
    `Latency Summary for ${summary.requestId}:`,
    `  Total: ${summary.totalMs.toFixed(2)}ms`,
  ];

  const phaseOrder: string[] = [RAGPhase.TRANSCRIPTION, RAGPhase.RETRIEVAL, RAGPhase.GENERATION];
  const ordered = [
    ...phaseOrder.filter((phase) => phase in summary.phases),
    ...Object.keys(summary.phases).filter((phase) => !phaseOrder.includes(phase)),
  ];

  for (const phase of ordered) {
    lines.push(`  ${phase}: ${(summary.phases[phase] ?? 0).toFixed(2)}ms`);
  }

  return lines.join('\n');
}
