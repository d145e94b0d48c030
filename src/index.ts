import 'reflect-metadata';

export * from './errors';
export * from './messages';
export * from './metadata';
export * from './transactions';
