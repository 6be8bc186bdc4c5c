export * from './deletion.interface';
