import { describe, it, expect, beforeEach } from 'vitest';
import { PipelineRunner, runVolumePipeline } from '../pipeline-runner';
import type { Step, StepAction } from '../types';
import { StateBag } from '../../pipeline/state-bag';
import { BuildConfig } from '../../config/build-config';
import { StepError } from '../../provisioning/errors';
import { FakeClientFactory, RecordingUi, makeSettings } from '../../provisioning/__tests__/fakes';

class RecordingStep implements Step {
  constructor(
    readonly name: string,
    private readonly events: string[],
    private readonly action: StepAction | Error = 'continue',
    private readonly cleanupError?: Error
  ) {}

  async run(): Promise<StepAction> {
    this.events.push(`run:${this.name}`);
    if (this.action instanceof Error) {
      throw this.action;
    }
    return this.action;
  }

  async cleanup(): Promise<void> {
    this.events.push(`cleanup:${this.name}`);
    if (this.cleanupError) {
      throw this.cleanupError;
    }
  }
}

describe('PipelineRunner', () => {
  let events: string[];
  let state: StateBag;
  let ui: RecordingUi;

  beforeEach(() => {
    events = [];
    ui = new RecordingUi();
    state = new StateBag();
    state.put('ui', ui);
  });

  it('should run every step and clean up in reverse order', async () => {
    const runner = new PipelineRunner([
      new RecordingStep('a', events),
      new RecordingStep('b', events),
      new RecordingStep('c', events)
    ]);

    const outcome = await runner.run(state);

    expect(outcome.status).toBe('completed');
    expect(outcome.error).toBeUndefined();
    expect(outcome.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(events).toEqual(['run:a', 'run:b', 'run:c', 'cleanup:c', 'cleanup:b', 'cleanup:a']);
  });

  it('should stop at a halting step and only clean up started steps', async () => {
    const failure = new Error('step b failed');
    const halting: Step = {
      name: 'b',
      run: async (bag: StateBag) => {
        events.push('run:b');
        bag.put('error', failure);
        return 'halt';
      },
      cleanup: async () => {
        events.push('cleanup:b');
      }
    };
    const runner = new PipelineRunner([new RecordingStep('a', events), halting, new RecordingStep('c', events)]);

    const outcome = await runner.run(state);

    expect(outcome.status).toBe('halted');
    expect(outcome.error).toBe(failure);
    expect(outcome.failure).toBeUndefined();
    expect(events).toEqual(['run:a', 'run:b', 'cleanup:b', 'cleanup:a']);
  });

  it('should clean up and rethrow when a step throws', async () => {
    const runner = new PipelineRunner([
      new RecordingStep('a', events),
      new RecordingStep('b', events, new Error('contract broken'))
    ]);

    await expect(runner.run(state)).rejects.toThrow('contract broken');
    expect(events).toEqual(['run:a', 'run:b', 'cleanup:b', 'cleanup:a']);
  });

  it('should report a failing cleanup and keep unwinding', async () => {
    const runner = new PipelineRunner([
      new RecordingStep('a', events),
      new RecordingStep('b', events, 'continue', new Error('delete failed'))
    ]);

    const outcome = await runner.run(state);

    expect(outcome.status).toBe('completed');
    expect(events).toEqual(['run:a', 'run:b', 'cleanup:b', 'cleanup:a']);
    expect(ui.errors).toEqual(['Cleanup of step b failed: delete failed']);
  });

  it('should not start any step once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const runner = new PipelineRunner([new RecordingStep('a', events)]);

    const outcome = await runner.run(state, controller.signal);

    expect(outcome.status).toBe('cancelled');
    expect(events).toEqual([]);
  });
});

describe('runVolumePipeline', () => {
  let clients: FakeClientFactory;
  let ui: RecordingUi;

  beforeEach(() => {
    clients = new FakeClientFactory();
    ui = new RecordingUi();
  });

  it('should hand the volume to downstream steps and delete it afterwards', async () => {
    clients.storage.statuses = ['creating', 'available'];
    const seen: Array<string | undefined> = [];
    const consumer: Step = {
      name: 'consume-volume',
      run: async (bag: StateBag) => {
        seen.push(bag.get('volume_id'));
        seen.push(`deleted:${clients.storage.deleteCalls.length}`);
        return 'continue';
      },
      cleanup: async () => undefined
    };

    const result = await runVolumePipeline(new BuildConfig(makeSettings(), clients), {
      sourceImage: 'ami-source',
      ui,
      steps: [consumer]
    });

    expect(result.status).toBe('completed');
    expect(result.volumeId).toBe('vol-1');
    expect(seen).toEqual(['vol-1', 'deleted:0']);
    expect(clients.storage.deleteCalls).toEqual(['vol-1']);
  });

  it('should delete a volume that failed to become available', async () => {
    clients.storage.statuses = ['creating', 'error'];
    const config = new BuildConfig(makeSettings(), clients);

    const result = await runVolumePipeline(config, { sourceImage: 'ami-source', ui });

    expect(result.status).toBe('halted');
    expect(result.volumeId).toBeUndefined();
    expect(result.error).toBeInstanceOf(StepError);
    expect(result.error instanceof StepError && result.error.kind).toBe('volume-failed');
    expect(result.failure).toEqual({
      code: 'VOLUME_FAILED',
      message: 'Error waiting for volume: volume vol-1 entered status "error"',
      phase: 'Error waiting for volume',
      remediation: undefined
    });
    expect(clients.storage.deleteCalls).toEqual(['vol-1']);
  });

  it('should skip the volume entirely when it is not required', async () => {
    const config = new BuildConfig(makeSettings({ use_blockstorage_volume: false }), clients);

    const result = await runVolumePipeline(config, { sourceImage: 'ami-source', ui });

    expect(result.status).toBe('completed');
    expect(result.volumeId).toBeUndefined();
    expect(clients.blockStorageBuilds).toBe(0);
    expect(clients.storage.deleteCalls).toEqual([]);
  });
});
