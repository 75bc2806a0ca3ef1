import {
  EC2Client,
  CreateVolumeCommand,
  type CreateVolumeCommandInput,
  type CreateVolumeCommandOutput,
  DescribeVolumesCommand,
  type DescribeVolumesCommandInput,
  type DescribeVolumesCommandOutput,
  DeleteVolumeCommand,
  type DeleteVolumeCommandInput,
  type DeleteVolumeCommandOutput,
  DescribeImagesCommand,
  type DescribeImagesCommandInput,
  type DescribeImagesCommandOutput
} from '@aws-sdk/client-ec2';
import { fromIni } from '@aws-sdk/credential-providers';
import type { AWSConfig } from '../types';

export interface RequestOptions {
  abortSignal?: AbortSignal;
}

/**
 * The EC2 operations the volume clients rely on.
 */
export interface Ec2VolumeApi {
  createVolume(input: CreateVolumeCommandInput): Promise<CreateVolumeCommandOutput>;
  describeVolumes(input: DescribeVolumesCommandInput, options?: RequestOptions): Promise<DescribeVolumesCommandOutput>;
  deleteVolume(input: DeleteVolumeCommandInput): Promise<DeleteVolumeCommandOutput>;
  describeImages(input: DescribeImagesCommandInput): Promise<DescribeImagesCommandOutput>;
}

export function createEc2Client(aws: AWSConfig): EC2Client {
  if (!aws.region) {
    throw new Error('AWS region is not configured');
  }

  return new EC2Client({
    region: aws.region,
    credentials: aws.profile ? fromIni({ profile: aws.profile }) : undefined
  });
}

export function createEc2VolumeApi(client: EC2Client): Ec2VolumeApi {
  return {
    createVolume: input => client.send(new CreateVolumeCommand(input)),
    describeVolumes: (input, options) => client.send(new DescribeVolumesCommand(input), options),
    deleteVolume: input => client.send(new DeleteVolumeCommand(input)),
    describeImages: input => client.send(new DescribeImagesCommand(input))
  };
}
