import type { EbsVolumeType } from '../config/clusterConfig';
import type { ConfigValidationMessage } from '../schema';
import { message } from './types';

const SIZE_BOUNDS: Record<EbsVolumeType, [number, number]> = {
  standard: [1, 1024],
  io1: [4, 16 * 1024],
  io2: [4, 64 * 1024],
  gp2: [1, 16 * 1024],
  gp3: [1, 16 * 1024],
  st1: [500, 16 * 1024],
  sc1: [500, 16 * 1024]
};

const IOPS_BOUNDS: Partial<Record<EbsVolumeType, [number, number]>> = {
  io1: [100, 64000],
  io2: [100, 256000],
  gp3: [3000, 16000]
};

const IOPS_PER_GIB: Partial<Record<EbsVolumeType, number>> = {
  io1: 50,
  io2: 1000,
  gp3: 500
};

export const DEFAULT_IOPS: Partial<Record<EbsVolumeType, number>> = {
  io1: 100,
  io2: 100,
  gp3: 3000
};

export const DEFAULT_EBS_SIZE = 35;
export const DEFAULT_GP3_THROUGHPUT = 125;

export interface EbsVolume {
  location: string;
  volumeType: EbsVolumeType;
  size?: number;
  iops?: number;
  throughput?: number;
  encrypted: boolean;
  kmsKeyId?: string;
}

export const validateVolumeTypeSize = (volume: EbsVolume): ConfigValidationMessage[] => {
  const size = volume.size ?? DEFAULT_EBS_SIZE;
  const [min, max] = SIZE_BOUNDS[volume.volumeType];
  if (size > max) {
    return [
      message(
        'EbsVolumeTypeSizeValidator',
        'ERROR',
        `${volume.location}: the size of ${volume.volumeType} volumes can not exceed ${max} GiB`
      )
    ];
  }
  if (size < min) {
    return [
      message(
        'EbsVolumeTypeSizeValidator',
        'ERROR',
        `${volume.location}: the size of ${volume.volumeType} volumes must be at least ${min} GiB`
      )
    ];
  }
  return [];
};

export const validateVolumeIops = (volume: EbsVolume): ConfigValidationMessage[] => {
  const bounds = IOPS_BOUNDS[volume.volumeType];
  const ratio = IOPS_PER_GIB[volume.volumeType];
  if (volume.iops === undefined) {
    return [];
  }
  if (!bounds || ratio === undefined) {
    return [
      message(
        'EbsVolumeIopsValidator',
        'ERROR',
        `${volume.location}: IOPS can only be set for io1, io2 and gp3 volumes`
      )
    ];
  }
  const messages: ConfigValidationMessage[] = [];
  const [min, max] = bounds;
  if (volume.iops < min || volume.iops > max) {
    messages.push(
      message(
        'EbsVolumeIopsValidator',
        'ERROR',
        `${volume.location}: IOPS rate must be between ${min} and ${max} when provisioning ${volume.volumeType} volumes.`
      )
    );
  }
  const size = volume.size ?? DEFAULT_EBS_SIZE;
  if (volume.iops > size * ratio) {
    messages.push(
      message(
        'EbsVolumeIopsValidator',
        'ERROR',
        `${volume.location}: IOPS to volume size ratio of ${volume.iops / size} is too high; maximum is ${ratio}.`
      )
    );
  }
  return messages;
};

export const validateVolumeThroughput = (volume: EbsVolume): ConfigValidationMessage[] => {
  if (volume.throughput === undefined) {
    return [];
  }
  if (volume.volumeType !== 'gp3') {
    return [
      message('EbsVolumeThroughputValidator', 'ERROR', `${volume.location}: Throughput can only be set for gp3 volumes`)
    ];
  }
  const messages: ConfigValidationMessage[] = [];
  if (volume.throughput < 125 || volume.throughput > 1000) {
    messages.push(
      message(
        'EbsVolumeThroughputValidator',
        'ERROR',
        `${volume.location}: Throughput must be between 125 MB/s and 1000 MB/s when provisioning gp3 volumes.`
      )
    );
  }
  const iops = volume.iops ?? DEFAULT_IOPS.gp3 ?? 3000;
  if (volume.throughput > iops * 0.25) {
    messages.push(
      message(
        'EbsVolumeThroughputValidator',
        'ERROR',
        `${volume.location}: Throughput to IOPS ratio of ${volume.throughput / iops} is too high; maximum is 0.25.`
      )
    );
  }
  return messages;
};

export const validateKmsKeyEncrypted = (volume: EbsVolume): ConfigValidationMessage[] => {
  if (volume.kmsKeyId && !volume.encrypted) {
    return [
      message(
        'KmsKeyIdEncryptedValidator',
        'ERROR',
        `${volume.location}: Kms Key Id ${volume.kmsKeyId} is specified, the encrypted state must be True.`
      )
    ];
  }
  return [];
};
