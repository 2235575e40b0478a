export * from './callbacks.js';
export * from './log-listener.js';
