export * from './validation';
export * from './client-config-schema';
export * from './embedding-schema';
export * from './json-value-schema';
