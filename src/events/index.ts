export * from './events';
export { EventBus } from './event-bus';
