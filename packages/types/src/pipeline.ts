/**
 * Pipeline Types - stage outcomes and the report of a validation run.
 */

export const STAGE_STATUS = {
  PASSED: 'passed',
  FAILED: 'failed',
  SKIPPED: 'skipped',
} as const;

export type StageStatus = typeof STAGE_STATUS[keyof typeof STAGE_STATUS];

/**
 * What a stage body hands back when it doesn't throw.
 * Failure is always a thrown error, never a returned value.
 */
export type StageOutcome =
  | { status: 'passed' }
  | { status: 'skipped'; reason: string };

/**
 * Tagged outcome of one stage, as recorded by the stage runner.
 */
export type StageResult =
  | { stage: string; status: 'passed'; durationMs: number }
  | { stage: string; status: 'failed'; durationMs: number; error: Error }
  | { stage: string; status: 'skipped'; durationMs: number; reason: string };

/**
 * JSON form of a stage result (errors flattened to code + message)
 */
export interface StageResultJSON {
  stage: string;
  status: StageStatus;
  durationMs: number;
  reason?: string;
  error?: {
    code: string;
    message: string;
  };
}
