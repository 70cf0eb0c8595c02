export * from './blhost-connection';
export * from './blhost-error';
export * from './blhost-service';
export * from './device-catalog';
export * from './device-config-error';
export * from './flash-layout';
export * from './prompt-service';
export * from './response-service';
