import type { PlayerId } from '../game/types';
import { EventIdCounter, type EventId } from '../protocol/envelope';
import type { ServerMessage, ServerToClientEvent } from '../protocol/messages';
import type { PlayerLink } from '../server/internalEvents';

/** In-memory PlayerLink that records everything the server writes to it. */
export class FakeLink implements PlayerLink {
  readonly sent: ServerMessage[] = [];
  playerId: PlayerId | null = null;
  closed = false;
  onSend: ((message: ServerMessage) => void) | null = null;
  private readonly ids = new EventIdCounter();

  constructor(readonly connectionId: string) {}

  send(event: ServerToClientEvent): EventId {
    const id = this.ids.next();
    this.record({ kind: 'request', id, event });
    return id;
  }

  respond(requestId: EventId, event: ServerToClientEvent) {
    this.record({ kind: 'response', id: requestId, event });
  }

  assign(playerId: PlayerId) {
    this.playerId = playerId;
  }

  close() {
    this.closed = true;
  }

  eventsOfType<T extends ServerToClientEvent['type']>(type: T): Extract<ServerToClientEvent, { type: T }>[] {
    return this.sent.flatMap((m) => (isOfType(m.event, type) ? [m.event] : []));
  }

  private record(message: ServerMessage) {
    this.sent.push(message);
    this.onSend?.(message);
  }
}

function isOfType<T extends ServerToClientEvent['type']>(
  event: ServerToClientEvent,
  type: T,
): event is Extract<ServerToClientEvent, { type: T }> {
  return event.type === type;
}
