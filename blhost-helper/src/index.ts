import 'reflect-metadata';
export * from './common/application-error';
export * from './common/protocol';
export * from './node/blhost-client';
export * from './node/blhost-command';
export * from './node/blhost-helper-module';
export * from './node/blhost-output-parser';
export { BlhostServiceImpl, formatTimestamp } from './node/blhost-service-impl';
export * from './node/catalog-loader';
export * from './node/device-config-resolver';
export * from './node/device-list';
export * from './node/device-setup';
export * from './node/settings-reader';
