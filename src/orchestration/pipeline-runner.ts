import { v4 as uuidv4 } from 'uuid';
import type { BuildConfig } from '../config/build-config';
import { StateBag } from '../pipeline/state-bag';
import type { Ui } from '../pipeline/ui';
import { CreateVolumeStep } from '../provisioning/create-volume-step';
import { StepError, describeError } from '../provisioning/errors';
import type { PipelineOutcome, PipelineStatus, Step } from './types';

/**
 * Runs steps in order and always unwinds the cleanup of every step that
 * started, last step first.
 */
export class PipelineRunner {
  constructor(private readonly steps: Step[]) {}

  async run(state: StateBag, signal: AbortSignal = new AbortController().signal): Promise<PipelineOutcome> {
    const runId = uuidv4();
    const startedAt = new Date();
    const started: Step[] = [];
    let status: PipelineStatus = 'completed';

    try {
      for (const step of this.steps) {
        if (signal.aborted) {
          status = 'cancelled';
          break;
        }

        started.push(step);
        const action = await step.run(state, signal);
        if (action === 'halt') {
          status = signal.aborted ? 'cancelled' : 'halted';
          break;
        }
      }
    } finally {
      await this.cleanup(started, state);
    }

    const error = state.get('error');
    return {
      runId,
      status,
      error,
      failure: error instanceof StepError ? error.toFailure() : undefined,
      startedAt,
      durationMs: Date.now() - startedAt.getTime()
    };
  }

  private async cleanup(started: Step[], state: StateBag): Promise<void> {
    for (const step of [...started].reverse()) {
      try {
        await step.cleanup(state);
      } catch (error) {
        const message = `Cleanup of step ${step.name} failed: ${describeError(error)}`;
        const ui = state.get('ui');
        if (ui) {
          ui.error(message);
        } else {
          console.error(message);
        }
      }
    }
  }
}

export interface VolumePipelineOptions {
  sourceImage: string;
  ui: Ui;
  /** Steps that run after the volume is available and consume `volume_id` */
  steps?: Step[];
  signal?: AbortSignal;
}

export interface VolumePipelineResult extends PipelineOutcome {
  volumeId?: string;
}

/**
 * Create the volume, hand it to the downstream steps, then clean up.
 */
export async function runVolumePipeline(
  config: BuildConfig,
  options: VolumePipelineOptions
): Promise<VolumePipelineResult> {
  const state = new StateBag();
  state.put('config', config);
  state.put('ui', options.ui);
  state.put('source_image', options.sourceImage);

  const runner = new PipelineRunner([CreateVolumeStep.fromConfig(config), ...(options.steps ?? [])]);
  const outcome = await runner.run(state, options.signal);

  return {
    ...outcome,
    volumeId: state.get('volume_id')
  };
}
