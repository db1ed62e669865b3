import {
  OS_IMAGE_NAME_PART,
  SUPPORTED_ARCHITECTURES,
  SUPPORTED_OSES,
  type AmiInfo,
  type Architecture,
  type SupportedOs
} from '@hpcfleet/cluster-model';

import type { Ec2Gateway } from '../aws';

export interface OfficialImage {
  info: AmiInfo;
  creationDate?: string;
}

const escape = (value: string) => value.replace(/[.*+?^${}()|[\]\\-]/g, '\\$&');

const osByNamePart = new Map<string, SupportedOs>(
  SUPPORTED_OSES.map((os): [string, SupportedOs] => [OS_IMAGE_NAME_PART[os], os])
);

const OFFICIAL_NAME_PATTERN = new RegExp(
  `^hpcfleet-(\\d+\\.\\d+\\.\\d+)-(${[...osByNamePart.keys()].map(escape).join('|')})-(${SUPPORTED_ARCHITECTURES.join('|')})-`
);

const isArchitecture = (value: string): value is Architecture =>
  SUPPORTED_ARCHITECTURES.some((architecture) => architecture === value);

/** Name filter of official AMIs: `hpcfleet-<version>-<os part>-<arch>-*`. */
export const officialImageNameFilter = (version: string, os?: SupportedOs, architecture?: Architecture): string =>
  `hpcfleet-${version}-${os ? OS_IMAGE_NAME_PART[os] : '*'}-${architecture ?? '*'}-*`;

export const listOfficialImages = async (
  ec2: Ec2Gateway,
  owners: string[],
  query: { version: string; os?: SupportedOs; architecture?: Architecture }
): Promise<OfficialImage[]> => {
  const amis = await ec2.describeAmis({
    owners,
    filters: [{ name: 'name', values: [officialImageNameFilter(query.version, query.os, query.architecture)] }]
  });
  const images: OfficialImage[] = [];
  for (const ami of amis) {
    const match = ami.name ? OFFICIAL_NAME_PATTERN.exec(ami.name) : null;
    const os = match ? osByNamePart.get(match[2]) : undefined;
    if (!match || !ami.name || !os || !isArchitecture(match[3])) {
      continue;
    }
    images.push({
      info: { amiId: ami.imageId, name: ami.name, os, architecture: match[3], version: match[1] },
      creationDate: ami.creationDate
    });
  }
  return images.sort((a, b) => a.info.name.localeCompare(b.info.name));
};

/** Most recently created official AMI for the operating system and architecture. */
export const latestOfficialImage = async (
  ec2: Ec2Gateway,
  owners: string[],
  query: { version: string; os: SupportedOs; architecture: Architecture }
): Promise<OfficialImage | null> => {
  const images = await listOfficialImages(ec2, owners, query);
  return images.reduce<OfficialImage | null>(
    (latest, image) => (!latest || (image.creationDate ?? '') > (latest.creationDate ?? '') ? image : latest),
    null
  );
};
