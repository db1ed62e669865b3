import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  isStartInProgress,
  isStopInProgress,
  isStopStatus,
  planStatusTransition,
  START_TRANSITION,
  STOP_TRANSITION,
  toClusterStatus,
  toImageBuildStatus
} from '../src';

test('plans stop requests from the current fleet status', () => {
  assert.deepEqual(planStatusTransition('RUNNING', STOP_TRANSITION), { kind: 'put', from: 'RUNNING', to: 'STOP_REQUESTED' });
  assert.deepEqual(planStatusTransition('STARTING', STOP_TRANSITION), { kind: 'put', from: 'STARTING', to: 'STOP_REQUESTED' });
  assert.deepEqual(planStatusTransition('STOP_REQUESTED', STOP_TRANSITION), { kind: 'noop-pending' });
  assert.deepEqual(planStatusTransition('STOPPING', STOP_TRANSITION), { kind: 'noop-pending' });
  assert.deepEqual(planStatusTransition('STOPPED', STOP_TRANSITION), { kind: 'noop-final' });
  assert.deepEqual(planStatusTransition('UNKNOWN', STOP_TRANSITION), { kind: 'unknown' });
});

test('plans start requests from the current fleet status', () => {
  assert.deepEqual(planStatusTransition('STOPPED', START_TRANSITION), { kind: 'put', from: 'STOPPED', to: 'START_REQUESTED' });
  assert.deepEqual(planStatusTransition('PROTECTED', START_TRANSITION), { kind: 'put', from: 'PROTECTED', to: 'START_REQUESTED' });
  assert.deepEqual(planStatusTransition('RUNNING', START_TRANSITION), { kind: 'noop-final' });
});

test('groups statuses into start and stop phases', () => {
  assert.equal(isStartInProgress('STARTING'), true);
  assert.equal(isStartInProgress('RUNNING'), false);
  assert.equal(isStopInProgress('STOP_REQUESTED'), true);
  assert.equal(isStopStatus('STOPPED'), true);
  assert.equal(isStopStatus('RUNNING'), false);
});

test('maps stack statuses to cluster statuses', () => {
  assert.equal(toClusterStatus('ROLLBACK_COMPLETE'), 'CREATE_FAILED');
  assert.equal(toClusterStatus('UPDATE_ROLLBACK_COMPLETE'), 'UPDATE_FAILED');
  assert.equal(toClusterStatus('UPDATE_COMPLETE_CLEANUP_IN_PROGRESS'), 'UPDATE_IN_PROGRESS');
  assert.equal(toClusterStatus('CREATE_COMPLETE'), 'CREATE_COMPLETE');
  assert.equal(toClusterStatus('DELETE_IN_PROGRESS'), 'DELETE_IN_PROGRESS');
  assert.equal(toClusterStatus('REVIEW_IN_PROGRESS'), 'UPDATE_IN_PROGRESS');
});

test('maps image stack statuses to build statuses', () => {
  assert.equal(toImageBuildStatus('CREATE_IN_PROGRESS'), 'BUILD_IN_PROGRESS');
  assert.equal(toImageBuildStatus('ROLLBACK_COMPLETE'), 'BUILD_FAILED');
  assert.equal(toImageBuildStatus('CREATE_COMPLETE'), 'BUILD_COMPLETE');
  assert.equal(toImageBuildStatus('DELETE_FAILED'), 'DELETE_FAILED');
});
