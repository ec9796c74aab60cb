import { describe, it, expect } from 'vitest';
import type { WithMetadata } from './envelope';
import { EventHandler } from './eventHandler';

type Msg = { type: string };

function setup() {
  const sent: WithMetadata<Msg>[] = [];
  const handler = new EventHandler<Msg, Msg>((m) => sent.push(m));
  return { handler, sent };
}

describe('EventHandler', () => {
  it('numbers outgoing requests from 1', () => {
    const { handler, sent } = setup();
    expect(handler.send({ type: 'a' })).toBe(1);
    expect(handler.send({ type: 'b' })).toBe(2);
    expect(sent).toEqual([
      { kind: 'request', id: 1, event: { type: 'a' } },
      { kind: 'request', id: 2, event: { type: 'b' } },
    ]);
    expect(handler.lastSentId()).toBe(2);
  });

  it('echoes the request id when responding', () => {
    const { handler, sent } = setup();
    const request: WithMetadata<Msg> = { kind: 'request', id: 41, event: { type: 'ping' } };
    handler.respond(request, { type: 'pong' });
    expect(sent).toEqual([{ kind: 'response', id: 41, event: { type: 'pong' } }]);
  });

  it('keeps requests and responses with the same id apart', () => {
    const { handler } = setup();
    handler.receive({ kind: 'request', id: 3, event: { type: 'req' } });
    handler.receive({ kind: 'response', id: 3, event: { type: 'resp' } });

    expect(handler.peekResponse(3)).toEqual({ kind: 'response', id: 3, event: { type: 'resp' } });
    expect(handler.takeRequest(3)).toEqual({ kind: 'request', id: 3, event: { type: 'req' } });
    expect(handler.takeRequest(3)).toBeUndefined();
    expect(handler.takeResponse(3)?.event).toEqual({ type: 'resp' });
    expect(handler.peekResponse(3)).toBeUndefined();
  });

  it('scans requests in id order regardless of arrival', () => {
    const { handler } = setup();
    handler.receive({ kind: 'request', id: 9, event: { type: 'game' } });
    handler.receive({ kind: 'request', id: 2, event: { type: 'chat' } });
    handler.receive({ kind: 'request', id: 5, event: { type: 'game' } });

    expect(handler.peekRequestWhere((e) => e.type === 'game')?.id).toBe(5);
    expect(handler.takeRequestWhere((e) => e.type === 'game')?.id).toBe(5);
    expect(handler.takeRequestWhere((e) => e.type === 'game')?.id).toBe(9);
    expect(handler.takeRequestWhere((e) => e.type === 'game')).toBeUndefined();
    expect(handler.pendingRequests()).toEqual([{ kind: 'request', id: 2, event: { type: 'chat' } }]);
  });

  it('leaves the inbox untouched on peek', () => {
    const { handler } = setup();
    handler.receive({ kind: 'request', id: 1, event: { type: 'x' } });
    handler.peekRequest(1);
    expect(handler.pendingRequests()).toHaveLength(1);
  });
});
