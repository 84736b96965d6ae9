/**
 * StageRunner - runs named validation stages one after another, fail-fast.
 *
 * For every stage it logs "<name>: RUNNING" (debug) and then exactly one of
 * "<name>: PASSED", "<name>: FAILED" or "<name>: SKIPPED (<reason>)".
 * A passed stage may dump the state it produced at debug level.
 *
 * The first stage that throws stops the run: no later stage executes and the
 * runner throws PipelineError carrying the stage name and the original error.
 * Stages are validation checks, so nothing is retried.
 *
 * Stage groups run their stages inside a scope (e.g. a temporary directory)
 * when their predicate holds, and report each stage as skipped otherwise.
 */

import { STAGE_STATUS, type Logger, type StageOutcome, type StageResult, type StageResultJSON } from '@keel/types';
import { KeelError, PipelineError } from '../errors/KeelError.js';

/**
 * One named unit of work.
 */
export interface Stage<C> {
  kind: 'stage';
  name: string;
  /** Returns nothing (= passed), or a skip; throws on failure */
  run(context: C): Promise<StageOutcome | void>;
  /** Debug dump of what the stage produced; called only after it passed */
  describe?(context: C, logger: Logger): void;
}

/**
 * Stages that only run when `when` holds, inside a scoped resource.
 */
export interface StageGroup<C> {
  kind: 'group';
  name: string;
  /** Evaluated once, right before the group would run */
  when(context: C): boolean;
  /** Reason reported for every stage of the group when `when` is false */
  skipReason: string;
  /**
   * Acquire the group's resource, run `body` with a context that exposes it,
   * release the resource on every exit path.
   */
  scope(context: C, body: (scoped: C) => Promise<void>): Promise<void>;
  stages: Stage<C>[];
}

export type PipelineStep<C> = Stage<C> | StageGroup<C>;

export interface StageRunnerDeps {
  logger: Logger;
  /** Clock for stage durations (ms) */
  now?: () => number;
}

export class StageRunner<C> {
  private readonly results: StageResult[] = [];
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: StageRunnerDeps) {
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
  }

  /** Results recorded so far, in execution order */
  get report(): StageResult[] {
    return [...this.results];
  }

  /**
   * Run every step in order.
   * @throws PipelineError from the first failing stage
   */
  async run(steps: readonly PipelineStep<C>[], context: C): Promise<StageResult[]> {
    for (const step of steps) {
      if (step.kind === 'group') {
        await this.runGroup(step, context);
      } else {
        await this.runStage(step, context);
      }
    }
    return this.report;
  }

  async runStage(stage: Stage<C>, context: C): Promise<void> {
    const { logger } = this;
    const start = this.now();
    logger.debug(`${stage.name}: RUNNING`);

    let outcome: StageOutcome | void;
    try {
      outcome = await stage.run(context);
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      this.results.push({ stage: stage.name, status: STAGE_STATUS.FAILED, durationMs: this.now() - start, error });
      logger.error(`${stage.name}: FAILED`);
      throw new PipelineError(stage.name, error, this.report);
    }

    const durationMs = this.now() - start;
    if (outcome && outcome.status === STAGE_STATUS.SKIPPED) {
      this.recordSkip(stage.name, outcome.reason, durationMs);
      return;
    }

    this.results.push({ stage: stage.name, status: STAGE_STATUS.PASSED, durationMs });
    this.describeResult(stage, context);
    logger.info(`${stage.name}: PASSED`);
  }

  async runGroup(group: StageGroup<C>, context: C): Promise<void> {
    let active: boolean;
    try {
      active = group.when(context);
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      this.results.push({ stage: group.name, status: STAGE_STATUS.FAILED, durationMs: 0, error });
      this.logger.error(`${group.name}: FAILED`);
      throw new PipelineError(group.name, error, this.report);
    }

    if (!active) {
      for (const stage of group.stages) {
        this.recordSkip(stage.name, group.skipReason, 0);
      }
      return;
    }

    let failure: PipelineError | undefined;
    try {
      await group.scope(context, async (scoped) => {
        for (const stage of group.stages) {
          await this.runStage(stage, scoped);
        }
      });
    } catch (e) {
      if (e instanceof PipelineError) {
        failure = e;
      } else {
        // The scope itself failed (acquire or release)
        const error = e instanceof Error ? e : new Error(String(e));
        this.results.push({ stage: group.name, status: STAGE_STATUS.FAILED, durationMs: 0, error });
        this.logger.error(`${group.name}: FAILED`);
        failure = new PipelineError(group.name, error, this.report);
      }
    }
    if (failure) throw failure;
  }

  /**
   * The dump is diagnostics only: a stage whose dump throws still passed.
   */
  private describeResult(stage: Stage<C>, context: C): void {
    if (!stage.describe) return;
    try {
      stage.describe(context, this.logger);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      this.logger.warn(`${stage.name}: could not describe result: ${message}`);
    }
  }

  private recordSkip(name: string, reason: string, durationMs: number): void {
    this.results.push({ stage: name, status: STAGE_STATUS.SKIPPED, durationMs, reason });
    this.logger.info(`${name}: SKIPPED (${reason})`);
  }
}

/**
 * JSON form of a stage result for the --json report
 */
export function stageResultToJSON(result: StageResult): StageResultJSON {
  switch (result.status) {
    case STAGE_STATUS.PASSED:
      return { stage: result.stage, status: result.status, durationMs: result.durationMs };
    case STAGE_STATUS.SKIPPED:
      return { stage: result.stage, status: result.status, durationMs: result.durationMs, reason: result.reason };
    case STAGE_STATUS.FAILED:
      return {
        stage: result.stage,
        status: result.status,
        durationMs: result.durationMs,
        error: {
          code: result.error instanceof KeelError ? result.error.code : 'ERR_UNKNOWN',
          message: result.error.message,
        },
      };
  }
}
