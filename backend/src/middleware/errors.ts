import type { Response } from 'express';
import { isGradebookError, type ErrorKind } from '../models/errors.js';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  InvalidArgument: 400,
  NotFound: 404,
  NotEnrolled: 409,
};

/** Answers domain errors with their status; anything else is logged and becomes a 500. */
export function sendError(res: Response, tag: string, error: unknown, fallbackMessage: string) {
  if (isGradebookError(error)) {
    return res.status(STATUS_BY_KIND[error.kind]).json({ error: error.message });
  }
  console.error(`[${tag}] Error:`, error);
  return res.status(500).json({ error: fallbackMessage });
}
