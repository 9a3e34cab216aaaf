export { EventStreamAdapter } from './adapter.js';
export { EventRouter } from './router.js';
export type { EventCallback, ErrorCallback } from './router.js';
export { SseParser } from './sse-parser.js';
export type { SseItem, SseEventItem, SseCommentItem } from './sse-parser.js';
export { FetchEventSource } from './transport.js';
export type { EventSourceTransport } from './transport.js';
export type { DatabaseEvent, EventHandler, StreamOptions } from './types.js';
