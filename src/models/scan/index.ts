export * from './scan.interface';
export * from './scan.constants';
