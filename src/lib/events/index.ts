export { EventEmitter } from './EventEmitter';
export type { EventHandler, EventMap } from './EventEmitter';
