/**
 * Request input helpers — narrow untyped JSON bodies and query strings
 */
import type { Request } from 'express';
import { InvalidArgumentError } from '../models/errors.js';

export type Body = Record<string, unknown>;

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function bodyOf(req: Request): Body {
  const body: unknown = req.body;
  return isBody(body) ? body : {};
}

export function requireString(body: Body, key: string): string {
  const value = body[key];
  if (typeof value !== 'string' || !value.trim()) {
    throw new InvalidArgumentError(`${key} is required`);
  }
  return value.trim();
}

export function optionalString(body: Body, key: string): string | undefined {
  const value = body[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

// Accepts JSON numbers and numeric strings
export function requireNumber(body: Body, key: string): number {
  const value = body[key];
  const parsed = typeof value === 'string' && value.trim() ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`${key} must be a number`);
  }
  return parsed;
}

export function optionalNumber(body: Body, key: string): number | undefined {
  return body[key] === undefined || body[key] === '' ? undefined : requireNumber(body, key);
}

export function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export function queryNumber(req: Request, key: string): number | undefined {
  const value = queryString(req, key);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`${key} must be a number`);
  }
  return parsed;
}
