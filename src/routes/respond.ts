import { FastifyReply } from 'fastify';
import { DeleteResult, FormValues, SaveResult } from '../types';
import { setFlash } from '../utils/flash';

export function sendHtml(reply: FastifyReply, html: string, statusCode = 200): FastifyReply {
  return reply.status(statusCode).type('text/html; charset=utf-8').send(html);
}

// Post/redirect/get: the list page shows the outcome
export function redirectWithFlash(reply: FastifyReply, location: string, level: 'success' | 'error', message: string): FastifyReply {
  setFlash(reply, level, message);
  return reply.code(303).redirect(location);
}

/**
 * Turns a save outcome into a response: back to the list when it was saved
 * or the record vanished, the form again with a 400 when the input was rejected.
 */
export function respondToSave(
  reply: FastifyReply,
  result: SaveResult,
  listPath: string,
  renderForm: (values: FormValues, error: string) => string
): FastifyReply {
  if (result.status === 'invalid') {
    return sendHtml(reply, renderForm(result.values, result.message), 400);
  }
  return redirectWithFlash(reply, listPath, result.status === 'saved' ? 'success' : 'error', result.message);
}

export function respondToDelete(reply: FastifyReply, result: DeleteResult, listPath: string): FastifyReply {
  return redirectWithFlash(reply, listPath, result.status === 'deleted' ? 'success' : 'error', result.message);
}
