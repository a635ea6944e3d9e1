/**
 * OpenAPI Response Schemas
 *
 * Reusable error schemas shared by every documented endpoint.
 */

import { z } from "zod";
import { extendZodWithOpenApi } from "@asteasolutions/zod-to-openapi";

extendZodWithOpenApi(z);

// ═══════════════════════════════════════════════════════════════════════════
// ERROR SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error response structure for all non-validation errors
 */
export const ErrorResponseSchema = z
  .object({
    detail: z.string().describe("Human-readable error message"),
  })
  .openapi("ErrorResponse");

/**
 * Validation error response (422 Unprocessable Entity)
 */
export const ValidationErrorSchema = z
  .object({
    detail: z.array(
      z.object({
        field: z.string().describe("Dotted path of the offending field"),
        message: z.string().describe("Error message for this field"),
      }),
    ),
  })
  .openapi("ValidationError");

// ═══════════════════════════════════════════════════════════════════════════
// COMMON ERROR RESPONSES FOR OPENAPI REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

export const commonErrorResponses = {
  400: {
    description: "Bad Request - The request body is not valid JSON",
    content: {
      "application/json": {
        schema: ErrorResponseSchema,
      },
    },
  },
  404: {
    description: "Not Found - The requested resource does not exist",
    content: {
      "application/json": {
        schema: ErrorResponseSchema,
      },
    },
  },
  422: {
    description: "Unprocessable Entity - Input failed validation",
    content: {
      "application/json": {
        schema: ValidationErrorSchema,
      },
    },
  },
  500: {
    description: "Internal Server Error - Unexpected error occurred",
    content: {
      "application/json": {
        schema: ErrorResponseSchema,
      },
    },
  },
} as const;
