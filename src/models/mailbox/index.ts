export * from './mailbox.interface';
