import type { FastifyReply, FastifyRequest } from 'fastify';
import { isFlashLevel, type FlashLevel, type FlashMessage } from '@progress-portal/shared';

export function addFlash(request: FastifyRequest, level: FlashLevel, text: string): void {
  request.flash(level, text);
}

/**
 * Pop every pending flash message from the session, in insertion order per
 * level. Unknown levels are dropped.
 */
export function consumeFlash(reply: FastifyReply): FlashMessage[] {
  const pending = reply.flash();
  const messages: FlashMessage[] = [];

  for (const [level, texts] of Object.entries(pending)) {
    if (!texts || !isFlashLevel(level)) continue;
    for (const text of texts) {
      messages.push({ level, text });
    }
  }

  return messages;
}
