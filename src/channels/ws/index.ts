export { ChatGateway } from './gateway';
export type { GatewayOptions, OpenOptions } from './gateway';
export { ClientConnection } from './connection';
export { registerChatRoute, resolveUserId, CHAT_ROUTE } from './adapter';
export * from './protocol';
export * from './types';
