/**
 * Server-Sent Events parser.
 *
 * Consumes decoded text in arbitrary chunks and emits complete items. A
 * chunk boundary may fall anywhere, including between `\r` and `\n`.
 */

/** A dispatched event. */
export interface SseEventItem {
  kind: 'event';
  eventType: string;
  data: string;
  id?: string;
  retry?: number;
}

/** A `:` comment line. */
export interface SseCommentItem {
  kind: 'comment';
  text: string;
}

export type SseItem = SseEventItem | SseCommentItem;

const DEFAULT_EVENT_TYPE = 'message';

/**
 * Incremental SSE parser.
 */
export class SseParser {
  private buffer = '';
  private eventType: string | undefined;
  private data: string[] = [];
  private id: string | undefined;
  private retry: number | undefined;
  private pendingCarriageReturn = false;

  /**
   * Feeds a chunk of text and returns the items it completed.
   */
  feed(chunk: string): SseItem[] {
    let text = chunk;
    if (this.pendingCarriageReturn) {
      this.pendingCarriageReturn = false;
      if (text.startsWith('\n')) {
        text = text.slice(1);
      }
    }

    this.buffer += text;
    const items: SseItem[] = [];

    while (true) {
      const match = /\r\n|\r|\n/.exec(this.buffer);
      if (!match) break;

      // A lone trailing \r may be the first half of \r\n.
      if (match[0] === '\r' && match.index === this.buffer.length - 1) {
        this.pendingCarriageReturn = true;
      }

      const line = this.buffer.slice(0, match.index);
      this.buffer = this.buffer.slice(match.index + match[0].length);

      const item = this.processLine(line);
      if (item) {
        items.push(item);
      }
    }

    return items;
  }

  /**
   * Ends the stream. A trailing event without a blank line is discarded,
   * as the SSE processing model requires.
   */
  flush(): SseItem[] {
    const items: SseItem[] = [];
    if (this.buffer.length > 0) {
      const item = this.processLine(this.buffer);
      if (item) {
        items.push(item);
      }
    }
    this.buffer = '';
    this.reset();
    return items;
  }

  private processLine(line: string): SseItem | null {
    if (line === '') {
      return this.dispatch();
    }

    if (line.startsWith(':')) {
      return { kind: 'comment', text: line.slice(1).trimStart() };
    }

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) {
      value = value.slice(1);
    }

    switch (field) {
      case 'event':
        this.eventType = value;
        break;
      case 'data':
        this.data.push(value);
        break;
      case 'id':
        this.id = value;
        break;
      case 'retry': {
        const retry = parseInt(value, 10);
        if (!isNaN(retry)) {
          this.retry = retry;
        }
        break;
      }
      default:
        // Unknown fields are ignored
        break;
    }
    return null;
  }

  private dispatch(): SseEventItem | null {
    // A block without data lines dispatches nothing.
    if (this.data.length === 0) {
      this.reset();
      return null;
    }

    const item: SseEventItem = {
      kind: 'event',
      eventType: this.eventType || DEFAULT_EVENT_TYPE,
      data: this.data.join('\n'),
    };
    if (this.id !== undefined) item.id = this.id;
    if (this.retry !== undefined) item.retry = this.retry;

    this.reset();
    return item;
  }

  private reset(): void {
    this.eventType = undefined;
    this.data = [];
    this.id = undefined;
    this.retry = undefined;
  }
}
