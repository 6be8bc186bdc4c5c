export * from './connect-failure.error';
export * from './mailbox-operation.error';
export * from './config.error';
