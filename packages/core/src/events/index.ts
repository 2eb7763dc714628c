export { EventBus } from './event-bus.js';
export type {
  BaseEvent,
  RegistryEvent,
  RegistryEventType,
  EventOf,
  EventHandler,
  EventSubscription,
  TaskCreatedEvent,
  TaskCompletedEvent,
  TaskDeletedEvent,
  TaskReassignedEvent,
  TaskUpdatedEvent,
  RegistryPausedEvent,
  RegistryResumedEvent,
} from './types.js';
