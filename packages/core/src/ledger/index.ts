export * from './accounts';
export * from './attachments';
export * from './compose';
export * from './entries';
export * from './settings';
