import {
  BadRequestException,
  SUPPRESSOR_PATTERN,
  parseSuppressors,
  runValidators,
  type ConfigValidationMessage,
  type Ec2Lookup,
  type ValidationLevel,
  type ValidationOutcome,
  type Validator
} from '@hpcfleet/cluster-model';

export interface ValidationOptions {
  suppressValidators?: string[];
  validationFailureLevel?: ValidationLevel;
  dryrun?: boolean;
}

export const validateConfiguration = async <TConfig>(
  validators: ReadonlyArray<Validator<TConfig>>,
  config: TConfig,
  lookup: Ec2Lookup,
  options: ValidationOptions
): Promise<ValidationOutcome> => {
  for (const expression of options.suppressValidators ?? []) {
    if (!SUPPRESSOR_PATTERN.test(expression)) {
      throw new BadRequestException(
        `suppressValidators value '${expression}' must be ALL or match the form type:<ValidatorName>.`
      );
    }
  }
  return runValidators(validators, config, lookup, {
    suppressors: parseSuppressors(options.suppressValidators),
    failureLevel: options.validationFailureLevel ?? 'ERROR'
  });
};

/** Response field for validation messages; omitted when there are none. */
export const reportedMessages = (messages: ConfigValidationMessage[]): ConfigValidationMessage[] | undefined =>
  messages.length > 0 ? messages : undefined;
