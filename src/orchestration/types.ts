// Orchestration-specific types
import type { StateBag } from '../pipeline/state-bag';
import type { StepFailure } from '../types';

export type StepAction = 'continue' | 'halt';

/**
 * A pipeline stage with a forward action and a compensating cleanup.
 */
export interface Step {
  readonly name: string;
  run(state: StateBag, signal: AbortSignal): Promise<StepAction>;
  cleanup(state: StateBag): Promise<void>;
}

export type PipelineStatus = 'completed' | 'halted' | 'cancelled';

export interface PipelineOutcome {
  runId: string;
  status: PipelineStatus;
  error?: Error;
  /** Report for a halt raised as a StepError */
  failure?: StepFailure;
  startedAt: Date;
  durationMs: number;
}
