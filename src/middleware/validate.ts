import type { NextFunction, Request, Response } from "express";
import { z } from "zod";

// Validation error response type
export interface ValidationIssue {
  field: string;
  message: string;
}

// Helper to clear and assign object properties
function replaceObjectContent(target: Record<string, unknown>, source: Record<string, unknown>) {
  for (const key of Object.keys(target)) {
    delete target[key];
  }
  Object.assign(target, source);
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));
}

// Validate params and body; rejected requests never reach the handler.
// Parsed params replace the originals in place, since the router owns req.params.
export function validateRequest(schemas: { body?: z.ZodType; params?: z.ZodType }) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        const data = schemas.params.parse(req.params);
        replaceObjectContent(
          req.params as Record<string, unknown>,
          data as Record<string, unknown>,
        );
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(422).json({
          detail: toValidationIssues(error),
        });
        return;
      }
      next(error);
    }
  };
}
