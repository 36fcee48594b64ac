export { Client, type ClientOptions } from './client.js';
export { ReaderTask, type ReaderSink } from './reader.js';
export { HeartbeatTask } from './heartbeat.js';
