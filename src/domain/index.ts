export type { Event, EventAction, EventInput, EventDocument, StoredEvent } from './event.js';
export { EVENT_ACTIONS, isEventAction, createEvent, toStorage, fromStorage } from './event.js';
export { ValidationError, StoreError } from './errors.js';
