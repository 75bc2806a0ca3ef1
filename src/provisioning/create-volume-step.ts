import { BuildConfig } from '../config/build-config';
import type { StateBag } from '../pipeline/state-bag';
import { isUi, type Ui } from '../pipeline/ui';
import type { Step, StepAction } from '../orchestration/types';
import type { BlockStorageClient, ImageClient } from './types';
import { StateContractError, VolumeWaitError, describeError, wrapStepError, type StepErrorKind } from './errors';
import { waitForVolume } from './volume-waiter';

export interface CreateVolumeStepOptions {
  useBlockStorageVolume: boolean;
  volumeName: string;
  volumeType?: string;
  volumeAvailabilityZone?: string;
}

interface StepInputs {
  config: BuildConfig;
  ui: Ui;
}

function readInputs(state: StateBag): StepInputs {
  const config = state.require('config');
  if (!(config instanceof BuildConfig)) {
    throw new StateContractError('config', 'expected a BuildConfig');
  }
  const ui = state.require('ui');
  if (!isUi(ui)) {
    throw new StateContractError('ui', 'expected a Ui with say, message and error');
  }
  return { config, ui };
}

function readSourceImage(state: StateBag): string {
  const sourceImage = state.require('source_image');
  if (typeof sourceImage !== 'string' || sourceImage === '') {
    throw new StateContractError('source_image', 'expected a non-empty image identifier');
  }
  return sourceImage;
}

function waitFailureKind(error: unknown): StepErrorKind {
  if (error instanceof VolumeWaitError) {
    if (error.reason === 'timed-out') return 'volume-timeout';
    if (error.reason === 'cancelled') return 'cancelled';
  }
  return 'volume-failed';
}

/**
 * Creates a block-storage volume from the source image when the build asks
 * for one, and deletes it again on cleanup.
 *
 * The volume ID is recorded as soon as the create request is accepted, so a
 * volume that never becomes available is still removed by cleanup.
 */
export class CreateVolumeStep implements Step {
  readonly name = 'create-volume';

  private volumeId?: string;
  private cleanedUp = false;

  constructor(private readonly options: CreateVolumeStepOptions) {}

  static fromConfig(config: BuildConfig): CreateVolumeStep {
    return new CreateVolumeStep({
      useBlockStorageVolume: config.useBlockStorageVolume,
      volumeName: config.volumeName,
      volumeType: config.volumeType,
      volumeAvailabilityZone: config.volumeAvailabilityZone
    });
  }

  /** ID of the volume this step created, if any. */
  get createdVolumeId(): string | undefined {
    return this.volumeId;
  }

  async run(state: StateBag, signal: AbortSignal): Promise<StepAction> {
    // Proceed only if a block storage volume is required.
    if (!this.options.useBlockStorageVolume) {
      return 'continue';
    }

    const { config, ui } = readInputs(state);
    const sourceImage = readSourceImage(state);

    const halt = (kind: StepErrorKind, phase: string, cause: unknown): StepAction => {
      const error = wrapStepError(kind, phase, cause);
      state.put('error', error);
      ui.error(error.message);
      return 'halt';
    };

    let blockStorage: BlockStorageClient;
    try {
      blockStorage = config.blockStorageClient();
    } catch (error) {
      return halt('client-construction', 'Error initializing block storage client', error);
    }

    let volumeSize = config.volumeSize;
    if (volumeSize === 0) {
      let imageClient: ImageClient;
      try {
        imageClient = config.imageClient();
      } catch (error) {
        return halt('client-construction', 'Error initializing image client', error);
      }

      try {
        volumeSize = await imageClient.getMinimumVolumeSize(sourceImage);
        if (!Number.isInteger(volumeSize) || volumeSize <= 0) {
          throw new Error(`image ${sourceImage} reported an invalid size: ${volumeSize}`);
        }
      } catch (error) {
        return halt('size-resolution', 'Error resolving volume size', error);
      }
    }

    ui.say('Creating volume...');
    let volumeId: string;
    try {
      volumeId = await blockStorage.createVolume({
        size: volumeSize,
        volumeType: this.options.volumeType,
        availabilityZone: this.options.volumeAvailabilityZone,
        name: this.options.volumeName,
        sourceImage,
        metadata: config.imageMetadata
      });
    } catch (error) {
      return halt('create-submission', 'Error creating volume', error);
    }

    // Record the ID before waiting so cleanup can find the volume.
    this.volumeId = volumeId;

    ui.say(`Waiting for volume ${this.options.volumeName} (volume id: ${volumeId}) to become available...`);
    try {
      await waitForVolume(blockStorage, volumeId, {
        timeoutMs: config.waitTimeoutMs,
        pollIntervalMs: config.pollIntervalMs,
        failureStatuses: blockStorage.failureStatuses,
        signal,
        onStatus: status => console.debug(`[create-volume] volume ${volumeId} status: ${status}`)
      });
    } catch (error) {
      return halt(waitFailureKind(error), 'Error waiting for volume', error);
    }

    ui.message(`Volume ID: ${volumeId}`);
    state.put('volume_id', volumeId);

    return 'continue';
  }

  async cleanup(state: StateBag): Promise<void> {
    if (!this.volumeId || this.cleanedUp) {
      return;
    }
    this.cleanedUp = true;

    const volumeId = this.volumeId;
    const { config, ui } = readInputs(state);

    let blockStorage: BlockStorageClient;
    try {
      blockStorage = config.blockStorageClient();
    } catch (error) {
      ui.error(`Error cleaning up volume. Please delete the volume manually: ${volumeId} (${describeError(error)})`);
      return;
    }

    ui.say(`Deleting volume: ${volumeId} ...`);
    try {
      const outcome = await blockStorage.deleteVolume(volumeId);
      if (outcome === 'already-absent') {
        ui.message(`Volume ${volumeId} was already deleted`);
      }
    } catch (error) {
      ui.error(`Error cleaning up volume "${volumeId}": ${describeError(error)}. This may need manual deletion.`);
    }
  }
}
