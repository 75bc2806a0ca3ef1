import { EC2ServiceException, VolumeType, type Tag } from '@aws-sdk/client-ec2';
import type {
  BlockStorageClient,
  ClientFactory,
  CreateVolumeRequest,
  DeleteOutcome,
  ImageClient,
  VolumeStatus
} from './types';
import { TransientStatusError, describeError } from './errors';
import { createEc2Client, createEc2VolumeApi, type Ec2VolumeApi } from './ec2-volume-api';

const VOLUME_NOT_FOUND = 'InvalidVolume.NotFound';

interface RootDevice {
  snapshotId?: string;
  volumeSize?: number;
}

export function isVolumeType(value: string): value is VolumeType {
  return Object.values(VolumeType).some(type => type === value);
}

function isVolumeNotFound(error: unknown): boolean {
  return error instanceof Error && error.name === VOLUME_NOT_FOUND;
}

function isServerFault(error: unknown): boolean {
  if (!(error instanceof EC2ServiceException)) {
    return false;
  }
  const status = error.$metadata?.httpStatusCode;
  return error.$fault === 'server' || (status !== undefined && status >= 500);
}

async function describeRootDevice(api: Ec2VolumeApi, imageId: string): Promise<RootDevice> {
  const result = await api.describeImages({ ImageIds: [imageId] });
  const image = result.Images?.[0];
  if (!image) {
    throw new Error(`Image ${imageId} not found`);
  }

  const mapping = image.BlockDeviceMappings?.find(m => m.DeviceName === image.RootDeviceName);
  if (!mapping?.Ebs) {
    throw new Error(`Image ${imageId} has no EBS root device`);
  }

  return {
    snapshotId: mapping.Ebs.SnapshotId,
    volumeSize: mapping.Ebs.VolumeSize
  };
}

// EC2 rejects duplicate tag keys; the volume name wins over a metadata Name.
function toTags(name: string, metadata: Record<string, string>): Tag[] {
  const tags = new Map<string, string>([['Name', name]]);
  Object.entries(metadata).forEach(([key, value]) => {
    if (!tags.has(key)) {
      tags.set(key, value);
    }
  });
  return Array.from(tags, ([Key, Value]) => ({ Key, Value }));
}

/**
 * EBS-backed block storage. Volumes are restored from the root snapshot of
 * the source AMI.
 */
export class Ec2BlockStorageClient implements BlockStorageClient {
  readonly failureStatuses: readonly VolumeStatus[] = ['error', 'deleting', 'deleted'];

  constructor(private readonly api: Ec2VolumeApi) {}

  async createVolume(request: CreateVolumeRequest): Promise<string> {
    const volumeType = request.volumeType;
    if (volumeType !== undefined && !isVolumeType(volumeType)) {
      throw new Error(`Unsupported EBS volume type: ${volumeType}`);
    }
    if (!request.availabilityZone) {
      throw new Error('An availability zone is required to create an EBS volume');
    }

    const root = await describeRootDevice(this.api, request.sourceImage);
    if (!root.snapshotId) {
      throw new Error(`Image ${request.sourceImage} has no root snapshot`);
    }

    const result = await this.api.createVolume({
      Size: request.size,
      VolumeType: volumeType,
      AvailabilityZone: request.availabilityZone,
      SnapshotId: root.snapshotId,
      TagSpecifications: [
        {
          ResourceType: 'volume',
          Tags: toTags(request.name, request.metadata)
        }
      ]
    });

    if (!result.VolumeId) {
      throw new Error('CreateVolume returned no volume ID');
    }
    return result.VolumeId;
  }

  async getVolumeStatus(volumeId: string, signal?: AbortSignal): Promise<VolumeStatus> {
    let volumeState: string | undefined;
    try {
      const result = await this.api.describeVolumes({ VolumeIds: [volumeId] }, { abortSignal: signal });
      volumeState = result.Volumes?.[0]?.State;
    } catch (error) {
      if (isVolumeNotFound(error) || isServerFault(error)) {
        throw new TransientStatusError(describeError(error), { cause: error });
      }
      throw error;
    }

    if (!volumeState) {
      throw new TransientStatusError(`Volume ${volumeId} has no reported state`);
    }
    return volumeState.toLowerCase();
  }

  async deleteVolume(volumeId: string): Promise<DeleteOutcome> {
    try {
      await this.api.deleteVolume({ VolumeId: volumeId });
      return 'deleted';
    } catch (error) {
      if (isVolumeNotFound(error)) {
        return 'already-absent';
      }
      throw error;
    }
  }
}

export class Ec2ImageClient implements ImageClient {
  constructor(private readonly api: Ec2VolumeApi) {}

  async getMinimumVolumeSize(imageId: string): Promise<number> {
    const root = await describeRootDevice(this.api, imageId);
    if (root.volumeSize === undefined) {
      throw new Error(`Image ${imageId} does not report a root volume size`);
    }
    return root.volumeSize;
  }
}

export const ec2ClientFactory: ClientFactory = {
  blockStorage: aws => new Ec2BlockStorageClient(createEc2VolumeApi(createEc2Client(aws))),
  image: aws => new Ec2ImageClient(createEc2VolumeApi(createEc2Client(aws)))
};
