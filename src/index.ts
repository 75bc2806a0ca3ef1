// Main entry point for the volume provisioning step
export * from './types';
export * from './config/types';
export { BuildConfig } from './config/build-config';
export { BuildConfigLoader, createConfigLoader, loadBuildConfig, loadDefaultConfig } from './config/loader';
export { validateConfig, validateAndNormalizeConfig, getConfigSchema } from './config/validator';
export * from './pipeline/state-bag';
export * from './pipeline/ui';
export * from './provisioning/types';
export * from './provisioning/errors';
export * from './provisioning/volume-waiter';
export * from './provisioning/ec2-clients';
export * from './provisioning/ec2-volume-api';
export * from './orchestration/types';
export { PipelineRunner } from './orchestration/pipeline-runner';

// Run the volume step followed by downstream steps
export { runVolumePipeline } from './orchestration/pipeline-runner';
export { CreateVolumeStep } from './provisioning/create-volume-step';
export type { CreateVolumeStepOptions } from './provisioning/create-volume-step';
export type { VolumePipelineOptions, VolumePipelineResult } from './orchestration/pipeline-runner';
export { sleep, withDeadline } from './utils/sleep';
export type { Sleeper } from './utils/sleep';
