export { eventBus, TypedEventBus } from './bus';
export { eventLogger, EventLogger } from './eventLogger';
export type * from './types';
