// Core type definitions for the volume provisioning step

export interface AWSConfig {
  region?: string;
  profile?: string;
}

export interface VolumeSettings {
  use_blockstorage_volume: boolean;
  volume_name?: string;
  volume_type?: string;
  volume_availability_zone?: string;
  /** Size in GiB. Zero means "size it from the source image". */
  volume_size: number;
  /** Seconds to wait for the volume to become available */
  wait_timeout: number;
  /** Seconds between status polls */
  poll_interval: number;
}

export interface BuilderConfig {
  image_name: string;
  image_metadata?: Record<string, string>;
  aws: AWSConfig;
  volume: VolumeSettings;
}

export interface StepFailure {
  code: string;
  message: string;
  phase?: string;
  remediation?: string;
}
