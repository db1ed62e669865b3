import type { ComputeFleetStatus } from './schema';

const START_IN_PROGRESS: ReadonlySet<ComputeFleetStatus> = new Set(['START_REQUESTED', 'STARTING']);
const STOP_IN_PROGRESS: ReadonlySet<ComputeFleetStatus> = new Set(['STOP_REQUESTED', 'STOPPING']);

export const isStartInProgress = (status: ComputeFleetStatus): boolean => START_IN_PROGRESS.has(status);

export const isStopInProgress = (status: ComputeFleetStatus): boolean => STOP_IN_PROGRESS.has(status);

export const isStopStatus = (status: ComputeFleetStatus): boolean => status === 'STOPPED' || isStopInProgress(status);

export const isStartStatus = (status: ComputeFleetStatus): boolean => status === 'RUNNING' || isStartInProgress(status);

export interface FleetTransition {
  request: ComputeFleetStatus;
  inProgress: ComputeFleetStatus;
  final: ComputeFleetStatus;
}

export const START_TRANSITION: FleetTransition = {
  request: 'START_REQUESTED',
  inProgress: 'STARTING',
  final: 'RUNNING'
};

export const STOP_TRANSITION: FleetTransition = {
  request: 'STOP_REQUESTED',
  inProgress: 'STOPPING',
  final: 'STOPPED'
};

export type TransitionPlan =
  | { kind: 'unknown' }
  | { kind: 'noop-final' }
  | { kind: 'noop-pending' }
  | { kind: 'put'; from: ComputeFleetStatus; to: ComputeFleetStatus };

/**
 * Decides how a requested transition applies to the current fleet status.
 * Only a `put` plan writes; the write must be conditional on `from` still being current.
 */
export const planStatusTransition = (current: ComputeFleetStatus, transition: FleetTransition): TransitionPlan => {
  if (current === 'UNKNOWN') {
    return { kind: 'unknown' };
  }
  if (current === transition.final) {
    return { kind: 'noop-final' };
  }
  if (current === transition.request || current === transition.inProgress) {
    return { kind: 'noop-pending' };
  }
  return { kind: 'put', from: current, to: transition.request };
};
