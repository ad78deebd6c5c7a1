import { ErrorCode } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import type { RunResult, RunSequenceOptions, SequenceReporter, Step, StepOutcome } from './types.js';

// ── Step invocation ──

/** Invoke a step action, turning a thrown error into a failed outcome */
export function invokeStep(step: Step): StepOutcome {
  try {
    return step.action();
  } catch (err: unknown) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

// ── Reporter hooks ──

/**
 * Call a reporter hook. A hook that throws is logged and ignored: progress
 * output never decides whether the next step runs.
 */
export function notifyReporter(hook: keyof SequenceReporter, step: Step, call: () => void): void {
  try {
    call();
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[deploy-sync] ${hook} reporter failed for step "${step.name}": ${message}`);
  }
}

// ── Sequencer (short-circuit on first failure) ──

/**
 * Run steps strictly in order, one at a time.
 *
 * Halts at the first failing step unless that step is marked
 * `continueOnFailure`; later actions are never invoked after a halt.
 */
export function runSequence(steps: readonly Step[], options: RunSequenceOptions = {}): RunResult {
  const { reporter } = options;
  const start = Date.now();
  const result: RunResult = {
    completed_steps: [],
    failed_step: null,
    error: null,
    error_code: null,
    tolerated: [],
    duration_ms: 0,
  };

  for (let i = 0; i < steps.length; i++) {
    const step = steps[i]!;
    const total = steps.length;
    notifyReporter('onStart', step, () => reporter?.onStart?.(step, i, total));
    debug('sequencer', `invoking "${step.name}"`);

    const outcome = invokeStep(step);

    if (outcome.ok) {
      result.completed_steps.push(step.name);
      notifyReporter('onSuccess', step, () => reporter?.onSuccess?.(step, i, total, outcome));
      continue;
    }

    if (step.continueOnFailure) {
      result.tolerated.push({ step: step.name, error: outcome.error });
      notifyReporter('onFailure', step, () => reporter?.onFailure?.(step, i, total, outcome.error, true));
      continue;
    }

    result.failed_step = step.name;
    result.error = outcome.error;
    result.error_code = step.errorCode ?? ErrorCode.STEP_FAILED;
    notifyReporter('onFailure', step, () => reporter?.onFailure?.(step, i, total, outcome.error, false));
    debug('sequencer', `halted at "${step.name}"`);
    break;
  }

  result.duration_ms = Date.now() - start;
  return result;
}

export function isSuccess(result: RunResult): boolean {
  return result.failed_step === null;
}
