import { z } from 'zod';

import { configTagSchema, rootVolumeSchema } from './clusterConfig';

const componentSchema = z
  .object({
    Type: z.enum(['arn', 'script']),
    Value: z.string().min(1)
  })
  .strict();

export const imageConfigSchema = z
  .object({
    Region: z.string().optional(),
    Image: z
      .object({
        Name: z.string().optional(),
        RootVolume: rootVolumeSchema.default({}),
        Tags: z.array(configTagSchema).optional()
      })
      .strict()
      .default({}),
    Build: z
      .object({
        InstanceType: z.string().min(1),
        ParentImage: z.string().min(1),
        SubnetId: z.string().optional(),
        SecurityGroupIds: z.array(z.string()).optional(),
        Components: z.array(componentSchema).optional(),
        Tags: z.array(configTagSchema).optional(),
        Iam: z
          .object({
            InstanceProfile: z.string().optional(),
            AdditionalIamPolicies: z.array(z.object({ Policy: z.string() }).strict()).optional()
          })
          .strict()
          .optional(),
        UpdateOsPackages: z
          .object({
            Enabled: z.boolean().default(false)
          })
          .strict()
          .default({})
      })
      .strict(),
    DevSettings: z
      .object({
        TerminateInstanceOnFailure: z.boolean().default(true)
      })
      .strict()
      .default({})
  })
  .strict();

export type ImageConfig = z.infer<typeof imageConfigSchema>;
export type ImageComponent = z.infer<typeof componentSchema>;
