export * from './constants';
export * from './syntax';
export * from './codec';
