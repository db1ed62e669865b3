import {
  imageStatusFilteringOptionSchema,
  validationLevelSchema,
  type ImageStatusFilteringOption,
  type ValidationLevel
} from '@hpcfleet/cluster-model';

import { collectList, enumValue, parseBoolean, readConfigurationFile } from '../lib/parse';
import { runWithClient, type CommandContext } from './context';

export function registerImageCommands(context: CommandContext): void {
  const { program } = context;

  program
    .command('build-image')
    .description('Build a custom AMI from an image configuration file')
    .requiredOption('--image-id <id>', 'Identifier of the image')
    .requiredOption('--image-configuration <file>', 'Path of the image configuration YAML')
    .option('--region <region>', 'AWS region')
    .option('--suppress-validators <validators>', 'Validators to skip, ALL or type:<name> (repeatable)', collectList)
    .option('--validation-failure-level <level>', 'Minimum level that fails validation', enumValue(validationLevelSchema))
    .option('--dryrun', 'Validate the request without starting the build')
    .option('--rollback-on-failure <boolean>', 'Roll the build stack back when it fails', parseBoolean)
    .option('--client-token <token>', 'Idempotency token for the stack request')
    .action(
      async (options: {
        imageId: string;
        imageConfiguration: string;
        region?: string;
        suppressValidators?: string[];
        validationFailureLevel?: ValidationLevel;
        dryrun?: boolean;
        rollbackOnFailure?: boolean;
        clientToken?: string;
      }) => {
        const { imageConfiguration, ...rest } = options;
        const configuration = await readConfigurationFile(imageConfiguration);
        await runWithClient(context, (client) => client.buildImage({ ...rest, imageConfiguration: configuration }));
      }
    );

  program
    .command('list-images')
    .description('List custom images by status')
    .requiredOption('--image-status <status>', 'AVAILABLE, PENDING or FAILED', enumValue(imageStatusFilteringOptionSchema))
    .option('--region <region>', 'AWS region')
    .option('--next-token <token>', 'Token of the next page')
    .action(async (options: { imageStatus: ImageStatusFilteringOption; region?: string; nextToken?: string }) => {
      await runWithClient(context, (client) => client.listImages(options));
    });

  program
    .command('describe-image')
    .description('Describe a custom image or its build')
    .requiredOption('--image-id <id>', 'Identifier of the image')
    .option('--region <region>', 'AWS region')
    .action(async (options: { imageId: string; region?: string }) => {
      await runWithClient(context, (client) => client.describeImage(options.imageId, { region: options.region }));
    });

  program
    .command('delete-image')
    .description('Delete a custom image and its build stack')
    .requiredOption('--image-id <id>', 'Identifier of the image')
    .option('--region <region>', 'AWS region')
    .option('--force', 'Delete even when instances still use the image')
    .action(async (options: { imageId: string; region?: string; force?: boolean }) => {
      await runWithClient(context, (client) => client.deleteImage(options));
    });

  program
    .command('list-official-images')
    .description('List the official hpcfleet AMIs')
    .option('--region <region>', 'AWS region')
    .option('--os <os>', 'Operating system filter')
    .option('--architecture <arch>', 'x86_64 or arm64')
    .action(async (options: { region?: string; os?: string; architecture?: string }) => {
      await runWithClient(context, (client) => client.listOfficialImages(options));
    });
}
