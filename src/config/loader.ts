import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import type { BuilderConfig } from '../types';
import type { ClientFactory } from '../provisioning/types';
import type { ConfigLoader, ConfigValidationResult } from './types';
import { validateAndNormalizeConfig, validateConfig } from './validator';
import { BuildConfig } from './build-config';
import { describeError } from '../provisioning/errors';

export const DEFAULT_CONFIG_FILES = ['build.yml', 'build.yaml', 'build.json'];

/**
 * Reads build settings from YAML or JSON, expanding `${VAR}` placeholders
 * before validation.
 */
export class BuildConfigLoader implements ConfigLoader {
  async load(path: string): Promise<BuilderConfig> {
    try {
      if (!existsSync(path)) {
        throw new Error(`Configuration file not found: ${path}`);
      }

      const content = await readFile(path, 'utf-8');

      let rawConfig: unknown;
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }

      return validateAndNormalizeConfig(this.resolveEnvironmentVariables(rawConfig));
    } catch (error) {
      throw new Error(`Failed to load configuration from ${path}: ${describeError(error)}`, { cause: error });
    }
  }

  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /** First path that loads and validates wins. */
  async loadFromPaths(searchPaths: string[]): Promise<BuilderConfig> {
    const errors: string[] = [];

    for (const path of searchPaths) {
      try {
        return await this.load(path);
      } catch (error) {
        errors.push(`${path}: ${describeError(error)}`);
      }
    }

    throw new Error(`Could not load configuration from any of the specified paths:\n${errors.join('\n')}`);
  }

  private resolveEnvironmentVariables(obj: unknown): unknown {
    if (typeof obj === 'string') {
      return this.substituteEnvironmentVariables(obj);
    }

    if (Array.isArray(obj)) {
      return obj.map(item => this.resolveEnvironmentVariables(item));
    }

    if (obj && typeof obj === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj)) {
        result[key] = this.resolveEnvironmentVariables(value);
      }
      return result;
    }

    return obj;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match: string, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = process.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset without a default: keep the placeholder
      return match;
    });
  }
}

export function createConfigLoader(): BuildConfigLoader {
  return new BuildConfigLoader();
}

export async function loadBuildConfig(path: string, clients?: ClientFactory): Promise<BuildConfig> {
  const settings = await createConfigLoader().load(path);
  return new BuildConfig(settings, clients);
}

/**
 * Load the first of build.yml, build.yaml or build.json found in `dir`.
 */
export async function loadDefaultConfig(dir: string = process.cwd()): Promise<BuilderConfig> {
  return createConfigLoader().loadFromPaths(DEFAULT_CONFIG_FILES.map(file => join(dir, file)));
}
