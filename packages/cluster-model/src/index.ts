export * from './constants';
export * from './schema';
export * from './errors';
export * from './computeFleet';
export * from './status';
export * from './version';
export * from './timestamps';
export * from './logFilters';
export * from './config/clusterConfig';
export * from './config/imageConfig';
export * from './config/parse';
export * from './validation/types';
export * from './validation/ebs';
export * from './validation/clusterValidators';
export * from './validation/imageValidators';
export * from './validation/runner';
export * from './update/changeSet';
