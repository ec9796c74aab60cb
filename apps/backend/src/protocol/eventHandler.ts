import { EventIdCounter, asRequest, responseTo, type EventId, type WithMetadata } from './envelope';

export type Sink<E> = (message: WithMetadata<E>) => void;

/**
 * One side of a connection. Outbound requests get fresh ids; inbound
 * requests and responses wait in two id-keyed inboxes until a consumer takes
 * them, so control messages can interleave with the ones being awaited.
 */
export class EventHandler<In, Out> {
  private readonly ids = new EventIdCounter();
  private readonly requests = new Map<EventId, In>();
  private readonly responses = new Map<EventId, In>();

  constructor(private readonly sink: Sink<Out>) {}

  send(event: Out): EventId {
    const id = this.ids.next();
    this.sink(asRequest(id, event));
    return id;
  }

  respond(request: Pick<WithMetadata<unknown>, 'id'>, event: Out) {
    this.sink(responseTo(request, event));
  }

  receive(message: WithMetadata<In>) {
    const inbox = message.kind === 'request' ? this.requests : this.responses;
    inbox.set(message.id, message.event);
  }

  takeRequest(id: EventId): WithMetadata<In> | undefined {
    return take(this.requests, 'request', id);
  }

  takeResponse(id: EventId): WithMetadata<In> | undefined {
    return take(this.responses, 'response', id);
  }

  /** Removes and returns the lowest-id request matching `predicate`. */
  takeRequestWhere(predicate: (event: In, id: EventId) => boolean): WithMetadata<In> | undefined {
    const found = this.peekRequestWhere(predicate);
    if (found) this.requests.delete(found.id);
    return found;
  }

  peekRequest(id: EventId): WithMetadata<In> | undefined {
    return peek(this.requests, 'request', id);
  }

  peekRequestWhere(predicate: (event: In, id: EventId) => boolean): WithMetadata<In> | undefined {
    for (const id of sortedIds(this.requests)) {
      const event = this.requests.get(id);
      if (event !== undefined && predicate(event, id)) return { kind: 'request', id, event };
    }
    return undefined;
  }

  peekResponse(id: EventId): WithMetadata<In> | undefined {
    return peek(this.responses, 'response', id);
  }

  pendingRequests(): WithMetadata<In>[] {
    return sortedIds(this.requests).flatMap((id) => {
      const found = peek(this.requests, 'request', id);
      return found ? [found] : [];
    });
  }

  lastSentId(): EventId {
    return this.ids.current();
  }
}

function sortedIds<T>(inbox: Map<EventId, T>): EventId[] {
  return [...inbox.keys()].sort((a, b) => a - b);
}

function peek<T>(inbox: Map<EventId, T>, kind: WithMetadata<T>['kind'], id: EventId): WithMetadata<T> | undefined {
  if (!inbox.has(id)) return undefined;
  const event = inbox.get(id);
  return event === undefined ? undefined : { kind, id, event };
}

function take<T>(inbox: Map<EventId, T>, kind: WithMetadata<T>['kind'], id: EventId): WithMetadata<T> | undefined {
  const found = peek(inbox, kind, id);
  if (found) inbox.delete(id);
  return found;
}
