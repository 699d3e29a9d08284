import { isValueList, type Event, type EventValue } from '../events/event.js';

export const FIELD_ROOTS = ['value', 'confidence', 'state', 'timestamp', 'sequence', 'detector', 'session_id'] as const;
export type FieldRoot = (typeof FIELD_ROOTS)[number];

export type FieldPath = {
  readonly root: FieldRoot;
  readonly segments: readonly string[]; // below `value` only
  readonly raw: string;
};

export type Resolved = { found: true; value: EventValue } | { found: false };

export class InvalidFieldPathError extends Error {
  constructor(readonly path: string, reason: string) {
    super(`invalid field path "${path}": ${reason}`);
    this.name = 'InvalidFieldPathError';
  }
}

export function parseFieldPath(raw: string): FieldPath {
  if (!raw) throw new InvalidFieldPathError(raw, 'empty');
  const [head, ...rest] = raw.split('.');
  if (rest.some(s => s === '') || !head) throw new InvalidFieldPathError(raw, 'empty segment');
  const root = FIELD_ROOTS.find(r => r === head);
  if (!root) throw new InvalidFieldPathError(raw, `unknown root "${head}"`);
  if (root !== 'value' && rest.length) throw new InvalidFieldPathError(raw, `"${root}" has no fields`);
  return { root, segments: rest, raw };
}

function rootValue(event: Event, root: FieldRoot): EventValue {
  switch (root) {
    case 'value': return event.value;
    case 'confidence': return event.confidence;
    case 'state': return event.state;
    case 'timestamp': return event.timestamp;
    case 'sequence': return event.sequence;
    case 'detector': return event.detector;
    case 'session_id': return event.sessionId;
  }
}

// Total: a missing key or a step into a scalar or list is "not found".
export function resolveFieldPath(event: Event, path: FieldPath): Resolved {
  let cur: EventValue = rootValue(event, path.root);
  for (const seg of path.segments) {
    if (cur === null || typeof cur !== 'object' || isValueList(cur)) return { found: false };
    if (!Object.prototype.hasOwnProperty.call(cur, seg)) return { found: false };
    const next: EventValue | undefined = cur[seg];
    if (next === undefined) return { found: false };
    cur = next;
  }
  return { found: true, value: cur };
}
