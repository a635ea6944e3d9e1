/**
 * OpenAPI Registry
 *
 * Shared registry that module `*.openapi.ts` files register their paths with.
 * Kept free of app imports so any module can load it first.
 */

import { OpenAPIRegistry, extendZodWithOpenApi } from "@asteasolutions/zod-to-openapi";
import { z } from "zod";

// Must run before any schema calls `.openapi()`
extendZodWithOpenApi(z);

export const registry = new OpenAPIRegistry();
