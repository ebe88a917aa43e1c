/**
 * @pipewright/shared — event types and the in-process event bus.
 */

export { EventBus, createEvent } from './event-bus/index.js';
export type { EventChannel, EventSource, BusEvent, EventHandler } from './types/index.js';
