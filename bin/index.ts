export * from '../src/Region';
export * from '../src/S3ClientConfig';
export * from '../src/utils/Utils';
