/**
 * Reassembles newline-delimited JSON-RPC messages from an arbitrarily
 * chunked byte stream.
 *
 * JSON serialisation escapes line breaks inside strings, so a raw 0x0A byte
 * can only ever be a message delimiter. Bytes are buffered (not decoded) until
 * a delimiter arrives, which keeps multi-byte UTF-8 sequences split across
 * chunks intact.
 */

import { FramingError } from "../multiplexer/errors";
import { type JsonRpcMessage, parseMessage } from "./messages";

const NEWLINE = 0x0a;

export const DEFAULT_MAX_SEGMENT_BYTES = 16 * 1024 * 1024;

export type FrameEvent =
  | { type: "message"; message: JsonRpcMessage; }
  | { type: "error"; error: FramingError; };

export interface FramerOptions {
  /** Largest segment accepted before it is discarded as malformed. */
  maxSegmentBytes?: number;
}

export class Framer {
  private buffer: Buffer = Buffer.alloc(0);
  // Bytes already known to contain no delimiter.
  private scanned = 0;
  // True while skipping the rest of an oversized segment.
  private discarding = false;
  private readonly maxSegmentBytes: number;

  constructor(options: FramerOptions = {}) {
    this.maxSegmentBytes = options.maxSegmentBytes
      ?? DEFAULT_MAX_SEGMENT_BYTES;
  }

  /**
   * Append a chunk and lazily yield every segment it completes, in arrival
   * order. A segment left unconsumed by the iterator stays buffered and is
   * yielded by the next call.
   */
  *feed(chunk: Buffer | string): Generator<FrameEvent, void, undefined> {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    this.buffer = this.buffer.length === 0
      ? bytes
      : Buffer.concat([this.buffer, bytes]);

    while (true) {
      const index = this.buffer.indexOf(NEWLINE, this.scanned);
      if (index === -1) {
        if (this.discarding) {
          this.buffer = Buffer.alloc(0);
          this.scanned = 0;
          return;
        }
        this.scanned = this.buffer.length;
        const overflow = this.checkOverflow();
        if (overflow) yield overflow;
        return;
      }

      const segment = this.buffer.subarray(0, index);
      this.buffer = this.buffer.subarray(index + 1);
      this.scanned = 0;

      if (this.discarding) {
        this.discarding = false;
        continue;
      }

      const event = decodeSegment(segment);
      if (event) yield event;
    }
  }

  /**
   * Signal end of stream. A trailing segment that never saw its delimiter is
   * reported as a FramingError unless it is blank.
   */
  end(): FrameEvent[] {
    const rest = this.buffer;
    const wasDiscarding = this.discarding;
    this.reset();
    if (wasDiscarding || rest.toString("utf8").trim() === "") {
      return [];
    }
    return [{
      type: "error",
      error: new FramingError(
        "Stream ended inside an unterminated message",
        preview(rest.toString("utf8")),
      ),
    }];
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.scanned = 0;
    this.discarding = false;
  }

  /** Number of bytes held for a segment that has not been completed yet. */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  private checkOverflow(): FrameEvent | null {
    if (this.buffer.length <= this.maxSegmentBytes) {
      return null;
    }
    const dropped = this.buffer.length;
    const head = this.buffer.subarray(0, 80).toString("utf8");
    this.buffer = Buffer.alloc(0);
    this.scanned = 0;
    this.discarding = true;
    return {
      type: "error",
      error: new FramingError(
        `Segment exceeded ${this.maxSegmentBytes} bytes (${dropped} buffered) without a delimiter`,
        preview(head),
      ),
    };
  }
}

function decodeSegment(segment: Buffer): FrameEvent | null {
  const line = segment.toString("utf8").replace(/\r$/, "");
  if (line.trim() === "") {
    return null;
  }
  try {
    return { type: "message", message: parseMessage(line) };
  } catch (err) {
    const reason = err instanceof SyntaxError
      ? `invalid JSON: ${err.message}`
      : "not a JSON-RPC 2.0 message";
    return {
      type: "error",
      error: new FramingError(`Malformed segment (${reason})`, preview(line)),
    };
  }
}

function preview(text: string): string {
  return text.length > 200 ? `${text.slice(0, 200)}…` : text;
}
