import type { CloudFormationStackStatus, ClusterStatus, ImageBuildStatus } from './schema';

export const STABLE_CLUSTER_STACK_STATUSES: readonly CloudFormationStackStatus[] = [
  'CREATE_COMPLETE',
  'UPDATE_COMPLETE',
  'UPDATE_ROLLBACK_COMPLETE'
];

export const toClusterStatus = (stackStatus: CloudFormationStackStatus): ClusterStatus => {
  switch (stackStatus) {
    case 'CREATE_IN_PROGRESS':
    case 'CREATE_COMPLETE':
    case 'UPDATE_IN_PROGRESS':
    case 'UPDATE_COMPLETE':
    case 'UPDATE_FAILED':
    case 'DELETE_IN_PROGRESS':
    case 'DELETE_FAILED':
    case 'DELETE_COMPLETE':
      return stackStatus;
    case 'CREATE_FAILED':
    case 'ROLLBACK_IN_PROGRESS':
    case 'ROLLBACK_FAILED':
    case 'ROLLBACK_COMPLETE':
      return 'CREATE_FAILED';
    case 'UPDATE_COMPLETE_CLEANUP_IN_PROGRESS':
      return 'UPDATE_IN_PROGRESS';
    case 'UPDATE_ROLLBACK_IN_PROGRESS':
    case 'UPDATE_ROLLBACK_FAILED':
    case 'UPDATE_ROLLBACK_COMPLETE_CLEANUP_IN_PROGRESS':
    case 'UPDATE_ROLLBACK_COMPLETE':
      return 'UPDATE_FAILED';
    default:
      return 'UPDATE_IN_PROGRESS';
  }
};

export const isStableClusterStackStatus = (stackStatus: CloudFormationStackStatus): boolean =>
  STABLE_CLUSTER_STACK_STATUSES.includes(stackStatus);

export const isFailedClusterStatus = (status: ClusterStatus): boolean =>
  status === 'CREATE_FAILED' || status === 'UPDATE_FAILED' || status === 'DELETE_FAILED';

/** Build status of an image whose AMI does not exist (yet). */
export const toImageBuildStatus = (stackStatus: CloudFormationStackStatus): ImageBuildStatus => {
  switch (stackStatus) {
    case 'CREATE_COMPLETE':
      return 'BUILD_COMPLETE';
    case 'CREATE_FAILED':
    case 'ROLLBACK_IN_PROGRESS':
    case 'ROLLBACK_FAILED':
    case 'ROLLBACK_COMPLETE':
      return 'BUILD_FAILED';
    case 'DELETE_IN_PROGRESS':
    case 'DELETE_FAILED':
    case 'DELETE_COMPLETE':
      return stackStatus;
    default:
      return 'BUILD_IN_PROGRESS';
  }
};
