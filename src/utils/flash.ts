import type { CookieSerializeOptions } from '@fastify/cookie';
import { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { FlashLevel, FlashMessage } from '../types';
import { logger } from './logger';

const FLASH_COOKIE = 'flash';

const COOKIE_OPTIONS: CookieSerializeOptions = {
  path: '/',
  httpOnly: true,
  sameSite: 'lax',
  signed: true
};

const FlashSchema = z.array(
  z.object({
    level: z.enum(['success', 'error']),
    message: z.string()
  })
);

/**
 * Leaves a one-time message for the next page the browser loads, in a signed cookie.
 */
export function setFlash(reply: FastifyReply, level: FlashLevel, message: string): FastifyReply {
  const messages: FlashMessage[] = [{ level, message }];
  return reply.setCookie(FLASH_COOKIE, JSON.stringify(messages), COOKIE_OPTIONS);
}

// Reads and clears the pending messages
export function takeFlash(request: FastifyRequest, reply: FastifyReply): FlashMessage[] {
  const raw = request.cookies[FLASH_COOKIE];
  if (raw === undefined) {
    return [];
  }
  reply.clearCookie(FLASH_COOKIE, { path: COOKIE_OPTIONS.path });

  const unsigned = request.unsignCookie(raw);
  if (!unsigned.valid || unsigned.value === null) {
    logger.warn('Ignoring flash cookie with an invalid signature');
    return [];
  }

  let data: unknown;
  try {
    data = JSON.parse(unsigned.value);
  } catch (error) {
    logger.warn({ err: error }, 'Ignoring unreadable flash cookie');
    return [];
  }

  const parsed = FlashSchema.safeParse(data);
  return parsed.success ? parsed.data : [];
}
