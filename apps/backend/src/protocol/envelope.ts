export type EventKind = 'request' | 'response';

export type EventId = number;

/** What actually crosses the wire: a payload tagged with its kind and a per-connection id. */
export type WithMetadata<E> = {
  kind: EventKind;
  id: EventId;
  event: E;
};

export function asRequest<E>(id: EventId, event: E): WithMetadata<E> {
  return { kind: 'request', id, event };
}

/** Answers `request` by echoing its id. */
export function responseTo<E>(request: Pick<WithMetadata<unknown>, 'id'>, event: E): WithMetadata<E> {
  return { kind: 'response', id: request.id, event };
}

/** Monotonic ids for one sending side; the first id is 1. */
export class EventIdCounter {
  private last: EventId = 0;

  next(): EventId {
    this.last += 1;
    return this.last;
  }

  current(): EventId {
    return this.last;
  }
}
