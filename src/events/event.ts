import { decode, encode } from '@msgpack/msgpack';
import { z } from 'zod';

export const EVENT_STATES = ['normal', 'warning', 'alert', 'uncertain'] as const;
export type EventState = (typeof EVENT_STATES)[number];

export type Scalar = number | string | boolean | null;
export type EventValue = Scalar | readonly EventValue[] | { readonly [key: string]: EventValue };
export type EventPayload = { readonly [key: string]: EventValue };

export class InvalidEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidEventError';
  }
}

export type EventInit = {
  detector: string;
  timestamp: number; // seconds
  confidence: number; // [0, 1]
  state: EventState;
  value?: EventPayload;
  sequence?: number;
  sessionId?: string;
};

/** Wire/debug shape. Field names match the JSON surfaces. */
export type EventDict = {
  detector: string;
  timestamp: number;
  confidence: number;
  state: EventState;
  value: EventPayload;
  sequence: number;
  session_id: string;
};

const eventValueSchema: z.ZodType<EventValue> = z.lazy(() =>
  z.union([z.number(), z.string(), z.boolean(), z.null(), z.array(eventValueSchema), z.record(eventValueSchema)]),
);

const eventDictSchema = z.object({
  detector: z.string(),
  timestamp: z.number(),
  confidence: z.number(),
  state: z.enum(EVENT_STATES),
  value: z.record(eventValueSchema).default({}),
  sequence: z.number().default(0),
  session_id: z.string().default(''),
});

export function isValueList(v: EventValue): v is readonly EventValue[] {
  return Array.isArray(v);
}

function freezeValue(v: EventValue): EventValue {
  if (v === null || typeof v !== 'object') return v;
  if (isValueList(v)) return Object.freeze(v.map(freezeValue));
  return freezePayload(v);
}

function freezePayload(p: EventPayload): EventPayload {
  const out: Record<string, EventValue> = {};
  for (const [k, v] of Object.entries(p)) out[k] = freezeValue(v);
  return Object.freeze(out);
}

/**
 * Immutable reading from one source at one instant.
 *
 * The payload is copied and frozen on construction so the same instance can be
 * handed to every consumer on the bus.
 */
export class Event {
  readonly detector: string;
  readonly timestamp: number;
  readonly confidence: number;
  readonly state: EventState;
  readonly value: EventPayload;
  readonly sequence: number;
  readonly sessionId: string;

  constructor(init: EventInit) {
    if (!init.detector) throw new InvalidEventError('detector must be a non-empty string');
    if (!Number.isFinite(init.timestamp)) throw new InvalidEventError(`timestamp must be finite, got ${init.timestamp}`);
    if (!Number.isFinite(init.confidence) || init.confidence < 0 || init.confidence > 1) {
      throw new InvalidEventError(`confidence must be between 0.0 and 1.0, got ${init.confidence}`);
    }
    if (!EVENT_STATES.includes(init.state)) throw new InvalidEventError(`unknown state ${String(init.state)}`);
    const sequence = init.sequence ?? 0;
    if (!Number.isInteger(sequence) || sequence < 0) throw new InvalidEventError(`sequence must be a non-negative integer, got ${sequence}`);

    this.detector = init.detector;
    this.timestamp = init.timestamp;
    this.confidence = init.confidence;
    this.state = init.state;
    this.value = freezePayload(init.value ?? {});
    this.sequence = sequence;
    this.sessionId = init.sessionId ?? '';
    Object.freeze(this);
  }

  toDict(): EventDict {
    return {
      detector: this.detector,
      timestamp: this.timestamp,
      confidence: this.confidence,
      state: this.state,
      value: this.value,
      sequence: this.sequence,
      session_id: this.sessionId,
    };
  }

  static fromDict(raw: unknown): Event {
    const parsed = eventDictSchema.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      throw new InvalidEventError(`malformed event: ${first ? `${first.path.join('.') || '<root>'} ${first.message}` : 'unknown'}`);
    }
    const d = parsed.data;
    return new Event({
      detector: d.detector,
      timestamp: d.timestamp,
      confidence: d.confidence,
      state: d.state,
      value: d.value,
      sequence: d.sequence,
      sessionId: d.session_id,
    });
  }

  /** MessagePack frame of the dict form. */
  toBytes(): Uint8Array {
    return encode(this.toDict());
  }

  static fromBytes(bytes: Uint8Array): Event {
    let raw: unknown;
    try {
      raw = decode(bytes);
    } catch (e) {
      throw new InvalidEventError(`undecodable event frame: ${e instanceof Error ? e.message : String(e)}`);
    }
    return Event.fromDict(raw);
  }
}

export function nowSeconds(): number {
  return Date.now() / 1000;
}

export type Clock = () => number;
