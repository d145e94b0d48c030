export * from './amf-value';
export * from './stream-metadata';
