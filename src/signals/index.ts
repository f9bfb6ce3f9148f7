export { QueuedSignalSource, parseCommand, type SignalSource } from './signalSource.js';
