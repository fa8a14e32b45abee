import type { Request, Response, NextFunction } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import { firstIssue } from '../../shared/utils/validation.js';

// Parse the body in place (defaults applied), or answer 400 with the first issue.
export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const parsed = schema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error) });
      return;
    }
    req.body = parsed.data;
    next();
  };
}
