export * from './domain-event';
export * from './event-bus.interface';
export * from './in-memory-event-bus';
export * from './user-registered.event';
export * from './events.module';
