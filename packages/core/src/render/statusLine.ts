/**
 * Status line formatting: `[F0 |F1 |...|Fn-1]` in field declaration order.
 */

import { describeThrown } from "../errors.js";
import { type FieldStore, MAX_FIELD_LEN } from "../fields/fieldStore.js";
import { type LogSink, makeLogSink } from "../log.js";

export const STATUS_OPEN = "[";
export const STATUS_SEPARATOR = " |";
export const STATUS_CLOSE = "]";

/**
 * Display surface for the rendered line. Failures are not reported back to
 * the dispatcher.
 */
export interface PublishSink {
  publish(line: string): void | Promise<void>;
}

export type StatusRenderer = Readonly<{
  render: () => Promise<string>;
  lastLine: () => string | null;
  renderCount: () => number;
}>;

export type StatusRendererOptions = Readonly<{
  fields: FieldStore;
  sink: PublishSink;
  log?: LogSink;
}>;

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: false });

export function statusLineMaxBytes(fieldCount: number): number {
  return fieldCount * (MAX_FIELD_LEN + 1);
}

/**
 * Concatenate raw field bytes with the status delimiters, truncated at
 * `maxBytes`.
 */
export function formatStatusBytes(
  fields: FieldStore,
  maxBytes: number = statusLineMaxBytes(fields.size),
): Uint8Array {
  const open = encoder.encode(STATUS_OPEN);
  const sep = encoder.encode(STATUS_SEPARATOR);
  const close = encoder.encode(STATUS_CLOSE);

  const parts: Uint8Array[] = [open];
  for (let i = 0; i < fields.size; i++) {
    if (i > 0) parts.push(sep);
    parts.push(fields.read(i).bytes);
  }
  parts.push(close);

  let total = 0;
  for (const p of parts) total += p.length;
  const out = new Uint8Array(Math.min(total, Math.max(0, maxBytes)));
  let offset = 0;
  for (const p of parts) {
    if (offset >= out.length) break;
    const take = Math.min(p.length, out.length - offset);
    out.set(p.subarray(0, take), offset);
    offset += take;
  }
  return out;
}

export function formatStatusLine(
  fields: FieldStore,
  maxBytes: number = statusLineMaxBytes(fields.size),
): string {
  return decoder.decode(formatStatusBytes(fields, maxBytes));
}

export function createRenderer(opts: StatusRendererOptions): StatusRenderer {
  const log = makeLogSink(opts.log);
  const maxBytes = statusLineMaxBytes(opts.fields.size);
  let last: string | null = null;
  let count = 0;

  return Object.freeze({
    async render(): Promise<string> {
      const line = formatStatusLine(opts.fields, maxBytes);
      last = line;
      count++;
      try {
        await opts.sink.publish(line);
      } catch (e: unknown) {
        log({ level: "warn", message: "publish failed", fields: { error: describeThrown(e) } });
      }
      return line;
    },
    lastLine(): string | null {
      return last;
    },
    renderCount(): number {
      return count;
    },
  });
}
