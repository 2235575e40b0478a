export * from './canonical.js';
export * from './envelope.js';
export * from './message-bus.js';
export * from './ring-buffer.js';
