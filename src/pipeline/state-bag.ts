import type { BuildConfig } from '../config/build-config';
import { StateContractError } from '../provisioning/errors';
import type { Ui } from './ui';

/**
 * Keys exchanged between pipeline steps and the type stored under each.
 */
export interface PipelineState {
  config: BuildConfig;
  ui: Ui;
  source_image: string;
  volume_id: string;
  error: Error;
}

export type StateKey = keyof PipelineState;

export class StateBag {
  private readonly values: Partial<PipelineState> = {};

  get<K extends StateKey>(key: K): PipelineState[K] | undefined {
    return this.values[key];
  }

  /**
   * @throws StateContractError when the key has not been set
   */
  require<K extends StateKey>(key: K): PipelineState[K] {
    const value = this.values[key];
    if (value === undefined) {
      throw new StateContractError(key, 'value is missing');
    }
    return value;
  }

  put<K extends StateKey>(key: K, value: PipelineState[K]): void {
    this.values[key] = value;
  }
}
