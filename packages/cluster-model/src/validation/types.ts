import type { Architecture } from '../constants';
import type { ConfigValidationMessage, ValidationLevel } from '../schema';

const LEVEL_ORDER: Record<ValidationLevel, number> = {
  INFO: 0,
  WARNING: 1,
  ERROR: 2
};

export const compareLevels = (left: ValidationLevel, right: ValidationLevel): number =>
  LEVEL_ORDER[left] - LEVEL_ORDER[right];

export const isAtLeast = (level: ValidationLevel, threshold: ValidationLevel): boolean =>
  compareLevels(level, threshold) >= 0;

export const sortByLevel = (messages: ConfigValidationMessage[]): ConfigValidationMessage[] =>
  [...messages].sort((a, b) => compareLevels(a.level, b.level));

export interface InstanceTypeInfo {
  instanceType: string;
  architectures: Architecture[];
  vcpus: number;
}

export interface ImageInfo {
  imageId: string;
  architecture: Architecture;
  rootVolumeSize?: number;
}

export interface SubnetInfo {
  subnetId: string;
  vpcId: string;
  availabilityZone: string;
}

/** EC2 facts consulted by the validators that need the cloud. */
export interface Ec2Lookup {
  describeInstanceTypes(instanceTypes: string[]): Promise<Map<string, InstanceTypeInfo>>;
  describeImages(imageIds: string[]): Promise<Map<string, ImageInfo>>;
  describeKeyPairs(keyNames: string[]): Promise<Set<string>>;
  describeSubnets(subnetIds: string[]): Promise<Map<string, SubnetInfo>>;
}

export type ValidatorResult = ConfigValidationMessage[] | Promise<ConfigValidationMessage[]>;

export interface Validator<TConfig> {
  type: string;
  validate(config: TConfig, lookup: Ec2Lookup): ValidatorResult;
}

export const message = (type: string, level: ValidationLevel, text: string): ConfigValidationMessage => ({
  type,
  level,
  message: text
});

export interface ValidatorSuppressor {
  suppresses(validatorType: string): boolean;
}

export class AllValidatorsSuppressor implements ValidatorSuppressor {
  suppresses(): boolean {
    return true;
  }
}

export class TypeMatchValidatorsSuppressor implements ValidatorSuppressor {
  constructor(private readonly types: ReadonlySet<string>) {}

  suppresses(validatorType: string): boolean {
    return this.types.has(validatorType);
  }
}

/** Accepts `ALL` and `type:<ValidatorType>` expressions; anything else is ignored. */
export const parseSuppressors = (expressions: readonly string[] | undefined): ValidatorSuppressor[] => {
  const suppressors: ValidatorSuppressor[] = [];
  if (!expressions || expressions.length === 0) {
    return suppressors;
  }
  const types = new Set<string>();
  for (const expression of expressions) {
    if (expression === 'ALL') {
      suppressors.push(new AllValidatorsSuppressor());
    } else if (expression.startsWith('type:')) {
      types.add(expression.slice('type:'.length));
    }
  }
  if (types.size > 0) {
    suppressors.push(new TypeMatchValidatorsSuppressor(types));
  }
  return suppressors;
};

export const SUPPRESSOR_PATTERN = /^(ALL|type:[A-Za-z0-9]+)$/;
