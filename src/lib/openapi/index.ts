/**
 * OpenAPI Documentation Generator
 *
 * Builds an OpenAPI 3.0.3 document at runtime from every definition
 * registered with the shared registry.
 */

import { OpenApiGeneratorV3 } from "@asteasolutions/zod-to-openapi";
import { registry } from "./registry";

export { registry } from "./registry";
export * from "./responses";

/**
 * Generate the complete OpenAPI document from all registered definitions
 */
export function generateOpenAPIDocument() {
  const generator = new OpenApiGeneratorV3(registry.definitions);

  return generator.generateDocument({
    openapi: "3.0.3",
    info: {
      title: "Ticket Tracker API",
      version: "1.0.0",
      description: `
A minimal issue tracker exposing create, read, update and delete operations on tickets.

## Error Handling

Errors carry a \`detail\` field. Not-found and server errors use a message:
\`\`\`json
{ "detail": "Ticket not found" }
\`\`\`
Validation failures (422) list the offending fields:
\`\`\`json
{ "detail": [{ "field": "title", "message": "Title is required" }] }
\`\`\`
      `.trim(),
      license: {
        name: "MIT",
        url: "https://opensource.org/licenses/MIT",
      },
    },
    servers: [
      {
        url: "http://localhost:3001",
        description: "Development server",
      },
    ],
    tags: [
      {
        name: "Tickets",
        description: "Create, read, update and delete tickets.",
      },
    ],
  });
}
