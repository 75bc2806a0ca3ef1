import type { BuilderConfig, AWSConfig } from '../types';
import type { BlockStorageClient, ClientFactory, ImageClient } from '../provisioning/types';
import { ec2ClientFactory } from '../provisioning/ec2-clients';

/**
 * Validated build configuration with lazily constructed service clients.
 */
export class BuildConfig {
  private blockStorage?: BlockStorageClient;
  private images?: ImageClient;

  constructor(
    readonly settings: BuilderConfig,
    private readonly clients: ClientFactory = ec2ClientFactory
  ) {}

  get aws(): AWSConfig {
    return this.settings.aws;
  }

  get useBlockStorageVolume(): boolean {
    return this.settings.volume.use_blockstorage_volume;
  }

  get volumeName(): string {
    return this.settings.volume.volume_name || this.settings.image_name;
  }

  get volumeType(): string | undefined {
    return this.settings.volume.volume_type || undefined;
  }

  get volumeAvailabilityZone(): string | undefined {
    return this.settings.volume.volume_availability_zone || undefined;
  }

  get volumeSize(): number {
    return this.settings.volume.volume_size;
  }

  get imageMetadata(): Record<string, string> {
    return this.settings.image_metadata ?? {};
  }

  get waitTimeoutMs(): number {
    return this.settings.volume.wait_timeout * 1000;
  }

  get pollIntervalMs(): number {
    return this.settings.volume.poll_interval * 1000;
  }

  /**
   * @throws when the client cannot be constructed; nothing is cached in that case
   */
  blockStorageClient(): BlockStorageClient {
    if (!this.blockStorage) {
      this.blockStorage = this.clients.blockStorage(this.aws);
    }
    return this.blockStorage;
  }

  imageClient(): ImageClient {
    if (!this.images) {
      this.images = this.clients.image(this.aws);
    }
    return this.images;
  }
}
