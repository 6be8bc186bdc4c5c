export * from './logger';
export * from './email-utils';
export * from './validation';
export * from './retry-utils';
export * from './cancellation-token';
