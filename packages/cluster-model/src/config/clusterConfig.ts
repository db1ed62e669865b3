import { z } from 'zod';

import {
  DEFAULT_LOG_RETENTION_DAYS,
  LOG_RETENTION_DAYS,
  SUPPORTED_OSES,
  SUPPORTED_SCHEDULERS
} from '../constants';

const nameSchema = z.string().min(1);

export const configTagSchema = z
  .object({
    Key: z.string().min(1).max(128),
    Value: z.string().max(256)
  })
  .strict();

export const ebsVolumeTypeSchema = z.enum(['standard', 'io1', 'io2', 'gp2', 'gp3', 'st1', 'sc1']);

export const rootVolumeSchema = z
  .object({
    Size: z.number().int().positive().optional(),
    Encrypted: z.boolean().default(false),
    VolumeType: ebsVolumeTypeSchema.default('gp3'),
    KmsKeyId: z.string().optional()
  })
  .strict();

const headNodeSchema = z
  .object({
    InstanceType: z.string().min(1),
    Networking: z
      .object({
        SubnetId: z.string().min(1),
        SecurityGroups: z.array(z.string()).optional(),
        AdditionalSecurityGroups: z.array(z.string()).optional(),
        ElasticIp: z.boolean().default(false)
      })
      .strict(),
    Ssh: z
      .object({
        KeyName: z.string().optional(),
        AllowedIps: z.string().default('0.0.0.0/0')
      })
      .strict()
      .default({}),
    LocalStorage: z
      .object({
        RootVolume: rootVolumeSchema.default({})
      })
      .strict()
      .default({})
  })
  .strict();

const capacityTypeSchema = z.enum(['ONDEMAND', 'SPOT']);

const slurmComputeResourceSchema = z
  .object({
    Name: nameSchema,
    InstanceType: z.string().min(1),
    MinCount: z.number().int().min(0).default(0),
    MaxCount: z.number().int().min(0).default(10),
    SpotPrice: z.number().positive().optional(),
    DisableSimultaneousMultithreading: z.boolean().default(false)
  })
  .strict();

const slurmQueueSchema = z
  .object({
    Name: nameSchema,
    CapacityType: capacityTypeSchema.default('ONDEMAND'),
    Networking: z
      .object({
        SubnetIds: z.array(z.string().min(1)).min(1),
        SecurityGroups: z.array(z.string()).optional(),
        AdditionalSecurityGroups: z.array(z.string()).optional(),
        PlacementGroup: z
          .object({
            Enabled: z.boolean().default(false),
            Id: z.string().optional()
          })
          .strict()
          .default({})
      })
      .strict(),
    ComputeResources: z.array(slurmComputeResourceSchema).min(1)
  })
  .strict();

const awsBatchComputeResourceSchema = z
  .object({
    Name: nameSchema,
    InstanceTypes: z.array(z.string().min(1)).min(1),
    MinvCpus: z.number().int().min(0).default(0),
    DesiredvCpus: z.number().int().min(0).default(0),
    MaxvCpus: z.number().int().min(0).default(10),
    SpotBidPercentage: z.number().int().min(1).max(100).optional()
  })
  .strict();

const awsBatchQueueSchema = z
  .object({
    Name: nameSchema,
    CapacityType: capacityTypeSchema.default('ONDEMAND'),
    Networking: z
      .object({
        SubnetIds: z.array(z.string().min(1)).min(1),
        SecurityGroups: z.array(z.string()).optional(),
        AdditionalSecurityGroups: z.array(z.string()).optional()
      })
      .strict(),
    ComputeResources: z.array(awsBatchComputeResourceSchema).min(1)
  })
  .strict();

const schedulingSchema = z
  .object({
    Scheduler: z.enum(SUPPORTED_SCHEDULERS),
    SlurmSettings: z
      .object({
        ScaledownIdletime: z.number().int().min(-1).default(10)
      })
      .strict()
      .optional(),
    SlurmQueues: z.array(slurmQueueSchema).optional(),
    AwsBatchQueues: z.array(awsBatchQueueSchema).optional()
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.Scheduler === 'slurm') {
      if (!value.SlurmQueues || value.SlurmQueues.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['SlurmQueues'],
          message: 'SlurmQueues must be defined when Scheduler is slurm'
        });
      }
      if (value.AwsBatchQueues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['AwsBatchQueues'],
          message: 'AwsBatchQueues cannot be used when Scheduler is slurm'
        });
      }
    } else {
      if (!value.AwsBatchQueues || value.AwsBatchQueues.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['AwsBatchQueues'],
          message: 'AwsBatchQueues must be defined when Scheduler is awsbatch'
        });
      }
      if (value.SlurmQueues || value.SlurmSettings) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [value.SlurmQueues ? 'SlurmQueues' : 'SlurmSettings'],
          message: 'Slurm settings cannot be used when Scheduler is awsbatch'
        });
      }
    }
  });

const ebsSettingsSchema = z
  .object({
    VolumeType: ebsVolumeTypeSchema.default('gp3'),
    Size: z.number().int().positive().optional(),
    Iops: z.number().int().positive().optional(),
    Throughput: z.number().int().positive().optional(),
    Encrypted: z.boolean().default(false),
    KmsKeyId: z.string().optional(),
    SnapshotId: z.string().optional(),
    VolumeId: z.string().optional(),
    DeletionPolicy: z.enum(['Retain', 'Delete', 'Snapshot']).default('Delete')
  })
  .strict();

const efsSettingsSchema = z
  .object({
    Encrypted: z.boolean().default(false),
    KmsKeyId: z.string().optional(),
    PerformanceMode: z.enum(['generalPurpose', 'maxIO']).default('generalPurpose'),
    ThroughputMode: z.enum(['bursting', 'provisioned']).default('bursting'),
    ProvisionedThroughput: z.number().int().min(1).max(1024).optional(),
    FileSystemId: z.string().optional(),
    DeletionPolicy: z.enum(['Retain', 'Delete']).default('Delete')
  })
  .strict();

const fsxLustreSettingsSchema = z
  .object({
    StorageCapacity: z.number().int().positive().optional(),
    DeploymentType: z.enum(['SCRATCH_1', 'SCRATCH_2', 'PERSISTENT_1']).default('SCRATCH_2'),
    FileSystemId: z.string().optional(),
    ImportPath: z.string().optional(),
    ExportPath: z.string().optional(),
    DeletionPolicy: z.enum(['Retain', 'Delete']).default('Delete')
  })
  .strict();

const sharedStorageSchema = z
  .object({
    Name: nameSchema,
    MountDir: z.string().regex(/^\/?[^\s]+$/, 'MountDir must be a path without whitespace'),
    StorageType: z.enum(['Ebs', 'Efs', 'FsxLustre']),
    EbsSettings: ebsSettingsSchema.optional(),
    EfsSettings: efsSettingsSchema.optional(),
    FsxLustreSettings: fsxLustreSettingsSchema.optional()
  })
  .strict()
  .transform((value) => {
    if (value.StorageType === 'Ebs') {
      return { ...value, EbsSettings: value.EbsSettings ?? ebsSettingsSchema.parse({}) };
    }
    if (value.StorageType === 'Efs') {
      return { ...value, EfsSettings: value.EfsSettings ?? efsSettingsSchema.parse({}) };
    }
    return { ...value, FsxLustreSettings: value.FsxLustreSettings ?? fsxLustreSettingsSchema.parse({}) };
  });

const retentionSchema = z
  .number()
  .int()
  .refine((value) => (LOG_RETENTION_DAYS as readonly number[]).includes(value), {
    message: `RetentionInDays must be one of ${LOG_RETENTION_DAYS.join(', ')}`
  });

const monitoringSchema = z
  .object({
    DetailedMonitoring: z.boolean().default(false),
    Logs: z
      .object({
        CloudWatch: z
          .object({
            Enabled: z.boolean().default(true),
            RetentionInDays: retentionSchema.default(DEFAULT_LOG_RETENTION_DAYS),
            DeletionPolicy: z.enum(['Retain', 'Delete']).default('Retain')
          })
          .strict()
          .default({})
      })
      .strict()
      .default({}),
    Dashboards: z
      .object({
        CloudWatch: z
          .object({
            Enabled: z.boolean().default(true)
          })
          .strict()
          .default({})
      })
      .strict()
      .default({})
  })
  .strict();

export const clusterConfigSchema = z
  .object({
    Region: z.string().optional(),
    Image: z
      .object({
        Os: z.enum(SUPPORTED_OSES),
        CustomAmi: z.string().optional()
      })
      .strict(),
    HeadNode: headNodeSchema,
    Scheduling: schedulingSchema,
    SharedStorage: z.array(sharedStorageSchema).optional(),
    Monitoring: monitoringSchema.default({}),
    Tags: z.array(configTagSchema).optional()
  })
  .strict();

export type ClusterConfig = z.infer<typeof clusterConfigSchema>;
export type ClusterConfigInput = z.input<typeof clusterConfigSchema>;
export type SlurmQueue = z.infer<typeof slurmQueueSchema>;
export type SlurmComputeResource = z.infer<typeof slurmComputeResourceSchema>;
export type AwsBatchQueue = z.infer<typeof awsBatchQueueSchema>;
export type AwsBatchComputeResource = z.infer<typeof awsBatchComputeResourceSchema>;
export type SharedStorage = z.infer<typeof sharedStorageSchema>;
export type EbsSettings = z.infer<typeof ebsSettingsSchema>;
export type EbsVolumeType = z.infer<typeof ebsVolumeTypeSchema>;
export type ConfigTag = z.infer<typeof configTagSchema>;

/** Every queue of the configured scheduler with its subnets and instance types. */
export interface QueueView {
  name: string;
  capacityType: 'ONDEMAND' | 'SPOT';
  subnetIds: string[];
  computeResources: Array<{ name: string; instanceTypes: string[] }>;
}

export const listQueues = (config: ClusterConfig): QueueView[] => {
  const slurm = (config.Scheduling.SlurmQueues ?? []).map((queue) => ({
    name: queue.Name,
    capacityType: queue.CapacityType,
    subnetIds: queue.Networking.SubnetIds,
    computeResources: queue.ComputeResources.map((resource) => ({
      name: resource.Name,
      instanceTypes: [resource.InstanceType]
    }))
  }));
  const batch = (config.Scheduling.AwsBatchQueues ?? []).map((queue) => ({
    name: queue.Name,
    capacityType: queue.CapacityType,
    subnetIds: queue.Networking.SubnetIds,
    computeResources: queue.ComputeResources.map((resource) => ({
      name: resource.Name,
      instanceTypes: resource.InstanceTypes
    }))
  }));
  return [...slurm, ...batch];
};
