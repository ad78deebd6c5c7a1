import type { ErrorCode } from '../lib/errors.js';

/** Typed result every step action returns */
export type StepOutcome =
  | { ok: true; detail?: string }
  | { ok: false; error: string };

/** A named unit of work in a deploy sequence */
export interface Step {
  name: string;
  action: () => StepOutcome;
  /** Record the failure and carry on instead of halting */
  continueOnFailure?: boolean;
  /** Classifies a halting failure in the run result */
  errorCode?: ErrorCode;
  /** Progress text, defaults to `name` */
  label?: string;
}

export interface ToleratedFailure {
  step: string;
  error: string;
}

export interface RunResult {
  completed_steps: string[];
  failed_step: string | null;
  error: string | null;
  error_code: ErrorCode | null;
  tolerated: ToleratedFailure[];
  duration_ms: number;
}

/** Progress hooks; all optional */
export interface SequenceReporter {
  onStart?(step: Step, index: number, total: number): void;
  onSuccess?(step: Step, index: number, total: number, outcome: StepOutcome): void;
  onFailure?(step: Step, index: number, total: number, error: string, tolerated: boolean): void;
}

export interface RunSequenceOptions {
  reporter?: SequenceReporter;
}
