import type { BlockStorageClient, VolumeStatus } from './types';
import { CancelledError, DeadlineExceededError, TransientStatusError, VolumeWaitError, describeError } from './errors';
import { sleep as defaultSleep, withDeadline, type Sleeper } from '../utils/sleep';

export type WaitState = 'creating' | 'ready' | 'failed' | 'timed-out';

export interface WaitOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  readyStatus?: VolumeStatus;
  failureStatuses?: readonly VolumeStatus[];
  /** Number of transient status lookup failures tolerated; the next one fails the wait. */
  maxTransientErrors?: number;
  signal?: AbortSignal;
  onStatus?: (status: VolumeStatus) => void;
  clock?: () => number;
  sleep?: Sleeper;
}

export const DEFAULT_READY_STATUS = 'available';
export const DEFAULT_FAILURE_STATUSES: readonly VolumeStatus[] = ['error'];
export const DEFAULT_MAX_TRANSIENT_ERRORS = 10;

/**
 * State transition for a single poll result.
 */
export function nextWaitState(
  status: VolumeStatus,
  readyStatus: VolumeStatus,
  failureStatuses: readonly VolumeStatus[]
): WaitState {
  const normalized = status.toLowerCase();
  if (normalized === readyStatus.toLowerCase()) {
    return 'ready';
  }
  if (failureStatuses.some(failure => failure.toLowerCase() === normalized)) {
    return 'failed';
  }
  return 'creating';
}

/**
 * Poll the volume until it reaches the ready status. Rejects with a
 * VolumeWaitError when the volume enters a failure status, the status can no
 * longer be read, the timeout elapses or the signal aborts.
 */
export async function waitForVolume(
  client: BlockStorageClient,
  volumeId: string,
  options: WaitOptions
): Promise<void> {
  const readyStatus = options.readyStatus ?? DEFAULT_READY_STATUS;
  const failureStatuses = options.failureStatuses ?? DEFAULT_FAILURE_STATUSES;
  const maxTransientErrors = options.maxTransientErrors ?? DEFAULT_MAX_TRANSIENT_ERRORS;
  const clock = options.clock ?? Date.now;
  const sleep = options.sleep ?? defaultSleep;
  const { signal } = options;

  const deadline = clock() + options.timeoutMs;
  let transientErrors = 0;
  let lastStatus: VolumeStatus | undefined;
  let state: WaitState = 'creating';

  while (state === 'creating') {
    if (signal?.aborted) {
      throw cancelled(volumeId, lastStatus);
    }

    let status: VolumeStatus | undefined;
    try {
      status = await withDeadline(
        pollSignal => client.getVolumeStatus(volumeId, pollSignal),
        deadline - clock(),
        signal
      );
    } catch (error) {
      if (error instanceof CancelledError) {
        throw cancelled(volumeId, lastStatus);
      }
      if (error instanceof DeadlineExceededError) {
        state = 'timed-out';
        break;
      }
      if (!(error instanceof TransientStatusError)) {
        throw new VolumeWaitError(
          'status-unavailable',
          volumeId,
          `could not read status of volume ${volumeId}: ${describeError(error)}`,
          { lastStatus, cause: error }
        );
      }
      transientErrors++;
      if (transientErrors > maxTransientErrors) {
        throw new VolumeWaitError(
          'status-unavailable',
          volumeId,
          `giving up on volume ${volumeId} after ${transientErrors} status errors: ${error.message}`,
          { lastStatus, cause: error }
        );
      }
      console.debug(`[volume-waiter] ${transientErrors}/${maxTransientErrors} status error ignored: ${error.message}`);
    }

    if (status !== undefined) {
      lastStatus = status;
      options.onStatus?.(status);
      state = nextWaitState(status, readyStatus, failureStatuses);
    }

    if (state === 'creating') {
      const remaining = deadline - clock();
      if (remaining <= 0) {
        state = 'timed-out';
        break;
      }
      try {
        await sleep(Math.min(options.pollIntervalMs, remaining), signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          throw cancelled(volumeId, lastStatus);
        }
        throw error;
      }
    }
  }

  if (state === 'failed') {
    throw new VolumeWaitError(
      'error-status',
      volumeId,
      `volume ${volumeId} entered status "${lastStatus}"`,
      { lastStatus }
    );
  }

  if (state === 'timed-out') {
    throw new VolumeWaitError(
      'timed-out',
      volumeId,
      `volume ${volumeId} did not become ${readyStatus} within ${options.timeoutMs / 1000} seconds` +
        (lastStatus ? ` (last status: ${lastStatus})` : ''),
      { lastStatus }
    );
  }
}

function cancelled(volumeId: string, lastStatus: VolumeStatus | undefined): VolumeWaitError {
  return new VolumeWaitError(
    'cancelled',
    volumeId,
    `wait for volume ${volumeId} was cancelled`,
    { lastStatus }
  );
}
