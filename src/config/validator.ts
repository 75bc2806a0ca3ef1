import Joi from 'joi';
import { VolumeType } from '@aws-sdk/client-ec2';
import type { AWSConfig, BuilderConfig, VolumeSettings } from '../types';
import type { ConfigValidationResult } from './types';

// Joi schema for AWSConfig
const awsConfigSchema = Joi.object<AWSConfig>({
  region: Joi.string()
    .pattern(/^[a-z0-9-]+$/)
    .default('us-east-1')
    .messages({
      'string.pattern.base': 'AWS region must be a valid region identifier'
    }),
  profile: Joi.string()
    .optional()
    .messages({
      'string.base': 'AWS profile must be a string'
    })
});

// Joi schema for VolumeSettings
const volumeSettingsSchema = Joi.object<VolumeSettings>({
  use_blockstorage_volume: Joi.boolean()
    .default(false)
    .messages({
      'boolean.base': 'use_blockstorage_volume must be a boolean value'
    }),
  volume_name: Joi.string()
    .max(255)
    .optional()
    .messages({
      'string.max': 'Volume name must be no more than 255 characters long'
    }),
  volume_type: Joi.string()
    .valid(...Object.values(VolumeType))
    .optional()
    .messages({
      'any.only': `Volume type must be one of: ${Object.values(VolumeType).join(', ')}`
    }),
  volume_availability_zone: Joi.string()
    .pattern(/^[a-z0-9-]+$/)
    .optional()
    .messages({
      'string.pattern.base': 'Volume availability zone must be a valid zone identifier'
    }),
  volume_size: Joi.number()
    .integer()
    .min(0)
    .max(65536)
    .default(0)
    .messages({
      'number.min': 'Volume size must not be negative',
      'number.max': 'Volume size must be no more than 65536 GiB'
    }),
  wait_timeout: Joi.number()
    .integer()
    .min(1)
    .default(600)
    .messages({
      'number.min': 'Wait timeout must be at least 1 second'
    }),
  poll_interval: Joi.number()
    .integer()
    .min(1)
    .default(2)
    .messages({
      'number.min': 'Poll interval must be at least 1 second'
    })
});

// Main BuilderConfig schema
const builderConfigSchema = Joi.object<BuilderConfig>({
  image_name: Joi.string()
    .required()
    .min(1)
    .max(255)
    .messages({
      'any.required': 'image_name is required',
      'string.max': 'Image name must be no more than 255 characters long'
    }),
  image_metadata: Joi.object()
    .pattern(Joi.string(), Joi.string())
    .optional()
    .messages({
      'object.pattern.match': 'Image metadata must be key-value pairs of strings'
    }),
  aws: awsConfigSchema.default(),
  volume: volumeSettingsSchema.default()
}).unknown(false);

/**
 * Validates a build configuration object against the schema
 * @param config - The configuration object to validate
 * @returns ConfigValidationResult with validation status and any errors
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = builderConfigSchema.validate(config, { abortEarly: false });

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates a build configuration and applies defaults
 * @throws Error listing every validation failure
 */
export function validateAndNormalizeConfig(config: unknown): BuilderConfig {
  const { error, value } = builderConfigSchema.validate(config, { abortEarly: false });

  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return value;
}

export function getConfigSchema(): Joi.ObjectSchema<BuilderConfig> {
  return builderConfigSchema;
}
