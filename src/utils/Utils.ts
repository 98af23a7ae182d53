import { Region } from '../Region';

/**
 * Region resolution utilities
 * Shared utilities for resolving the S3 region across different components
 */

export type RegionConfig = {
  region?: string | Region;
  env?: NodeJS.ProcessEnv;
};

/**
 * Resolves the S3 region from multiple sources in priority order:
 * 1. Explicit region from config
 * 2. S3_ENDPOINT environment variable (always a custom region)
 * 3. AWS_REGION environment variable
 * 4. REGION environment variable (custom fallback)
 * 5. undefined (let the caller decide on a default)
 */
export function resolveRegion(config?: RegionConfig): Region | undefined {
  const env = config?.env ?? process.env;

  // 1. Check explicit config first
  if (config?.region) {
    return typeof config.region === 'string' ? Region.parse(config.region) : config.region;
  }

  // 2. An explicit endpoint is never looked up in the known region table
  if (env.S3_ENDPOINT) {
    return Region.custom(env.S3_ENDPOINT);
  }

  // 3. Check AWS_REGION environment variable
  if (env.AWS_REGION) {
    return Region.parse(env.AWS_REGION);
  }

  // 4. Check REGION environment variable (custom fallback)
  if (env.REGION) {
    return Region.parse(env.REGION);
  }

  return undefined;
}

/**
 * Same as resolveRegion, but a missing region is an error.
 */
export function requireRegion(config?: RegionConfig): Region {
  const region = resolveRegion(config);
  if ( ! region) {
    throw new Error('Region is required: set config.region, S3_ENDPOINT, AWS_REGION or REGION');
  }
  return region;
}
