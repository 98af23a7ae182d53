import { S3Client, S3ClientConfig } from '@aws-sdk/client-s3';
import { Region } from './Region';

/**
 * Signing region used for endpoints outside of AWS. DigitalOcean Spaces and most self-hosted
 * S3 compatible services (MinIO, LocalStack) accept it.
 */
export const NON_AWS_SIGNING_REGION = 'us-east-1';

const isDigitalOcean = (region: Region): boolean => {
  const { tag } = region;
  return tag === 'DoNyc3' || tag === 'DoAms3' || tag === 'DoSgp1';
}

/**
 * Translates a region into the configuration an S3Client needs to reach it.
 * AWS regions are left to the SDK's own endpoint resolution. DigitalOcean regions and custom
 * regions get an explicit endpoint built from the region's scheme and host, and custom regions
 * default to path-style addressing.
 * @param region - The resolved region
 * @param base - Client settings to carry over. An explicit endpoint, region or forcePathStyle here wins
 * for every kind of region.
 */
export const toS3ClientConfig = (region: Region, base: S3ClientConfig = {}): S3ClientConfig => {
  if (region.isCustom) {
    return {
      ...base,
      region: base.region ?? NON_AWS_SIGNING_REGION,
      endpoint: base.endpoint ?? region.origin,
      forcePathStyle: base.forcePathStyle ?? true
    };
  }
  if (isDigitalOcean(region)) {
    return {
      ...base,
      region: base.region ?? NON_AWS_SIGNING_REGION,
      endpoint: base.endpoint ?? region.origin
    };
  }
  return { ...base, region: base.region ?? region.display };
}

/**
 * Creates an S3Client for the region. No connection is made until a command is sent.
 */
export const createS3Client = (region: Region, base?: S3ClientConfig): S3Client => {
  console.log(`Creating S3 client for region ${region.display} at ${region.origin}`);
  return new S3Client(toS3ClientConfig(region, base));
}
