import type { ConfigValidationMessage, ValidationLevel } from '../schema';
import { isAtLeast, type Ec2Lookup, type Validator, type ValidatorSuppressor } from './types';

export interface ValidationOutcome {
  messages: ConfigValidationMessage[];
  failed: boolean;
}

export const runValidators = async <TConfig>(
  validators: ReadonlyArray<Validator<TConfig>>,
  config: TConfig,
  lookup: Ec2Lookup,
  options: { suppressors: ValidatorSuppressor[]; failureLevel: ValidationLevel }
): Promise<ValidationOutcome> => {
  const active = validators.filter(
    (validator) => !options.suppressors.some((suppressor) => suppressor.suppresses(validator.type))
  );
  const results = await Promise.all(active.map(async (validator) => validator.validate(config, lookup)));
  const messages = results.flat();
  return {
    messages,
    failed: messages.some((entry) => isAtLeast(entry.level, options.failureLevel))
  };
};
