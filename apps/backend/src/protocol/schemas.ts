import { z } from 'zod';
import type { ClientMessage } from './messages';

const playerResponseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('resp_ok') }),
  z.object({ type: z.literal('attack_target_selected'), payload: z.object({ targetIdx: z.number().int() }) }),
  z.object({ type: z.literal('number_guessed'), payload: z.object({ number: z.number().int() }) }),
  z.object({ type: z.literal('attack_or_stay_decided'), payload: z.object({ attack: z.boolean() }) }),
]);

export const clientToServerEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('request_join') }),
  z.object({ type: z.literal('game_event_response'), payload: playerResponseSchema }),
]);

export const clientMessageSchema = z.object({
  kind: z.enum(['request', 'response']),
  id: z.number().int().nonnegative(),
  event: clientToServerEventSchema,
});

export type ParseResult = { ok: true; message: ClientMessage } | { ok: false; error: string };

/** Validates an inbound envelope; only acknowledgements and decisions are accepted as answers. */
export function parseClientMessage(raw: unknown): ParseResult {
  const parsed = clientMessageSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'message';
    return { ok: false, error: `malformed message at ${where}: ${issue ? issue.message : 'invalid'}` };
  }
  return { ok: true, message: parsed.data };
}
