export * from './report.interface';
