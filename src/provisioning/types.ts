// Provisioning-specific types
import type { AWSConfig } from '../types';

/** Remote status string as reported by the block-storage service, lower-cased. */
export type VolumeStatus = string;

export interface CreateVolumeRequest {
  size: number;
  volumeType?: string;
  availabilityZone?: string;
  name: string;
  sourceImage: string;
  metadata: Record<string, string>;
}

export type DeleteOutcome = 'deleted' | 'already-absent';

export interface BlockStorageClient {
  /** Statuses that mean the volume will never become available. */
  readonly failureStatuses?: readonly VolumeStatus[];
  createVolume(request: CreateVolumeRequest): Promise<string>;
  getVolumeStatus(volumeId: string, signal?: AbortSignal): Promise<VolumeStatus>;
  /** Delete the volume whatever its current status; an absent volume is not an error. */
  deleteVolume(volumeId: string): Promise<DeleteOutcome>;
}

export interface ImageClient {
  /** Minimum volume size in GiB needed to hold the image. */
  getMinimumVolumeSize(imageId: string): Promise<number>;
}

export interface ClientFactory {
  blockStorage(aws: AWSConfig): BlockStorageClient;
  image(aws: AWSConfig): ImageClient;
}
