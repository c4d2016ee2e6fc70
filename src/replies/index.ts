export { ReplyServiceImpl } from './ReplyService';
export type { ReplyService, ReplyServiceConfig } from './ReplyService';
