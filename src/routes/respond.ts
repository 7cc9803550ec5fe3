import { Response } from 'express';
import type { Logger } from 'pino';
import { z } from 'zod';
import { errorMessage, NotFoundError, ValidationError } from '../errors';

export function statusFor(error: unknown): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof ValidationError) return 400;
  return 500;
}

/** Known client errors carry their message; anything else is logged and hidden. */
export function sendError(res: Response, log: Logger, error: unknown, fallback: string): void {
  const status = statusFor(error);
  if (status === 500) {
    log.error({ err: error }, fallback);
    res.status(500).json({ success: false, error: fallback });
    return;
  }
  res.status(status).json({ success: false, error: errorMessage(error) });
}

export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid ${what}`,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}
