export * from './build-step-port.js';
export * from './measurement-step-port.js';
export * from './result-sink-port.js';
export * from './sweep-journal-port.js';
export * from './clockPort.js';
