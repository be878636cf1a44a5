export * from './radar.js';
export * from './scanner.js';
export * from './wifi.js';
export * from './resilience.js';
