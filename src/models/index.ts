export * from './EmailReply';
export * from './errors';
export * from './Result';
export * from './validation';
