import { StateBag } from '../../pipeline/state-bag';
import type { Ui } from '../../pipeline/ui';
import type { BuildConfig } from '../../config/build-config';
import type { BuilderConfig, VolumeSettings } from '../../types';
import type {
  BlockStorageClient,
  ClientFactory,
  CreateVolumeRequest,
  DeleteOutcome,
  ImageClient,
  VolumeStatus
} from '../types';

/**
 * Scripted block storage. Statuses are returned in order; the last one repeats.
 */
export class FakeBlockStorage implements BlockStorageClient {
  createResult: string | Error = 'vol-1';
  statuses: Array<VolumeStatus | Error> = ['available'];
  deleteResult: DeleteOutcome | Error = 'deleted';
  failureStatuses?: VolumeStatus[];

  readonly createCalls: CreateVolumeRequest[] = [];
  readonly statusCalls: string[] = [];
  readonly deleteCalls: string[] = [];

  async createVolume(request: CreateVolumeRequest): Promise<string> {
    this.createCalls.push(request);
    if (this.createResult instanceof Error) {
      throw this.createResult;
    }
    return this.createResult;
  }

  async getVolumeStatus(volumeId: string): Promise<VolumeStatus> {
    const next = this.statuses[Math.min(this.statusCalls.length, this.statuses.length - 1)];
    this.statusCalls.push(volumeId);
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async deleteVolume(volumeId: string): Promise<DeleteOutcome> {
    this.deleteCalls.push(volumeId);
    if (this.deleteResult instanceof Error) {
      throw this.deleteResult;
    }
    return this.deleteResult;
  }
}

export class FakeImageClient implements ImageClient {
  size: number | Error = 20;
  readonly calls: string[] = [];

  async getMinimumVolumeSize(imageId: string): Promise<number> {
    this.calls.push(imageId);
    if (this.size instanceof Error) {
      throw this.size;
    }
    return this.size;
  }
}

export class FakeClientFactory implements ClientFactory {
  blockStorageError?: Error;
  imageError?: Error;
  blockStorageBuilds = 0;
  imageBuilds = 0;

  constructor(
    readonly storage: FakeBlockStorage = new FakeBlockStorage(),
    readonly images: FakeImageClient = new FakeImageClient()
  ) {}

  blockStorage(): BlockStorageClient {
    this.blockStorageBuilds++;
    if (this.blockStorageError) {
      throw this.blockStorageError;
    }
    return this.storage;
  }

  image(): ImageClient {
    this.imageBuilds++;
    if (this.imageError) {
      throw this.imageError;
    }
    return this.images;
  }
}

export class RecordingUi implements Ui {
  readonly says: string[] = [];
  readonly messages: string[] = [];
  readonly errors: string[] = [];

  say(message: string): void {
    this.says.push(message);
  }

  message(message: string): void {
    this.messages.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}

export function makeSettings(volume: Partial<VolumeSettings> = {}): BuilderConfig {
  return {
    image_name: 'test-image',
    image_metadata: { team: 'infra' },
    aws: { region: 'us-east-1' },
    volume: {
      use_blockstorage_volume: true,
      volume_name: 'test-volume',
      volume_type: 'gp3',
      volume_availability_zone: 'us-east-1a',
      volume_size: 0,
      // Keep real waits short in tests
      wait_timeout: 600,
      poll_interval: 0.001,
      ...volume
    }
  };
}

export function makeState(config: BuildConfig, ui: Ui, sourceImage = 'ami-source'): StateBag {
  const state = new StateBag();
  state.put('config', config);
  state.put('ui', ui);
  state.put('source_image', sourceImage);
  return state;
}
