/**
 * Fixed set of bounded text buffers, one per status field.
 *
 * Buffers are allocated once and mutated in place. A stored value never
 * contains a newline or a NUL and never exceeds MAX_FIELD_LEN bytes;
 * `data[length]` is always 0.
 */

import { BarlineError } from "../errors.js";

/** Maximum stored bytes per field (the buffer holds one more for the terminator). */
export const MAX_FIELD_LEN = 255;

const NUL = 0x00;
const NEWLINE = 0x0a;

/** Ordinal of a field in declaration order. */
export type FieldId = number;

export const DEFAULT_FIELD_NAMES = Object.freeze([
  "time",
  "load",
  "temp",
  "volume",
  "mic",
  "memory",
  "governor",
  "lang",
  "weather",
  "date",
] as const);

export type FieldView = Readonly<{
  bytes: Uint8Array;
  length: number;
}>;

export type FieldStore = Readonly<{
  names: readonly string[];
  size: number;
  fieldIndex: (name: string) => FieldId;
  write: (id: FieldId, source: Uint8Array) => number;
  writeText: (id: FieldId, text: string) => number;
  clear: (id: FieldId) => void;
  read: (id: FieldId) => FieldView;
  readText: (id: FieldId) => string;
}>;

type FieldBuffer = {
  length: number;
  readonly data: Uint8Array;
};

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: false });

/**
 * Number of bytes a write of `source` stores: everything before the first
 * newline or NUL, capped at MAX_FIELD_LEN.
 */
export function storedLength(source: Uint8Array): number {
  const limit = Math.min(source.length, MAX_FIELD_LEN);
  for (let i = 0; i < limit; i++) {
    const b = source[i];
    if (b === NEWLINE || b === NUL) return i;
  }
  return limit;
}

export function createFieldStore(names: readonly string[] = DEFAULT_FIELD_NAMES): FieldStore {
  if (names.length === 0) {
    throw new BarlineError("BARLINE_INVALID_CONFIG", "field store needs at least one field");
  }
  const byName = new Map<string, FieldId>();
  names.forEach((name, i) => {
    if (name.length === 0) {
      throw new BarlineError("BARLINE_INVALID_CONFIG", `field #${String(i)} has an empty name`);
    }
    if (byName.has(name)) {
      throw new BarlineError("BARLINE_INVALID_CONFIG", `duplicate field name "${name}"`);
    }
    byName.set(name, i);
  });

  const buffers: FieldBuffer[] = names.map(() => ({
    length: 0,
    data: new Uint8Array(MAX_FIELD_LEN + 1),
  }));

  function bufferOf(id: FieldId): FieldBuffer {
    const buf = Number.isInteger(id) ? buffers[id] : undefined;
    if (buf === undefined) {
      throw new BarlineError("BARLINE_UNKNOWN_FIELD", `unknown field id ${String(id)}`);
    }
    return buf;
  }

  function write(id: FieldId, source: Uint8Array): number {
    const buf = bufferOf(id);
    const len = storedLength(source);
    buf.data.set(source.subarray(0, len), 0);
    buf.data[len] = 0;
    buf.length = len;
    return len;
  }

  function read(id: FieldId): FieldView {
    const buf = bufferOf(id);
    return Object.freeze({ bytes: buf.data.subarray(0, buf.length), length: buf.length });
  }

  return Object.freeze({
    names: Object.freeze([...names]),
    size: names.length,
    fieldIndex(name: string): FieldId {
      const id = byName.get(name);
      if (id === undefined) {
        throw new BarlineError("BARLINE_UNKNOWN_FIELD", `unknown field "${name}"`);
      }
      return id;
    },
    write,
    writeText(id: FieldId, text: string): number {
      return write(id, encoder.encode(text));
    },
    clear(id: FieldId): void {
      const buf = bufferOf(id);
      buf.data[0] = 0;
      buf.length = 0;
    },
    read,
    readText(id: FieldId): string {
      return decoder.decode(read(id).bytes);
    },
  });
}
