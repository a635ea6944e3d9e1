/**
 * Tickets Module - OpenAPI Route Definitions
 *
 * Registers the ticket CRUD endpoints with the OpenAPI registry.
 */

import { z } from "zod";
import { extendZodWithOpenApi } from "@asteasolutions/zod-to-openapi";
import { commonErrorResponses, registry } from "@/lib/openapi";
import {
  createTicketSchema,
  TICKET_ID_PATTERN,
  ticketResponseSchema,
  updateTicketSchema,
} from "./tickets.schema";

extendZodWithOpenApi(z);

// ═══════════════════════════════════════════════════════════════════════════
// TICKET SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

const TicketSchema = ticketResponseSchema.openapi("Ticket", {
  example: { id: 1, title: "Bug", description: "Fix crash", status: "open" },
});

const CreateTicketRequestSchema = createTicketSchema.openapi("CreateTicketRequest");

const UpdateTicketRequestSchema = updateTicketSchema.openapi("UpdateTicketRequest", {
  description: "Any subset of fields; omitted fields are left unchanged",
});

const TicketIdParamsSchema = z.object({
  id: z.string().regex(TICKET_ID_PATTERN).openapi({
    param: { name: "id", in: "path" },
    example: "1",
    description: "Ticket ID, a decimal integer",
  }),
});

const ticketResponse = (description: string) => ({
  description,
  content: {
    "application/json": {
      schema: TicketSchema,
    },
  },
});

// ═══════════════════════════════════════════════════════════════════════════
// ROUTES
// ═══════════════════════════════════════════════════════════════════════════

// POST /tickets
registry.registerPath({
  method: "post",
  path: "/tickets",
  tags: ["Tickets"],
  summary: "Create ticket",
  description: "Create a ticket. New tickets always start with status `open`.",
  request: {
    body: {
      content: {
        "application/json": {
          schema: CreateTicketRequestSchema,
        },
      },
    },
  },
  responses: {
    201: ticketResponse("Ticket created"),
    400: commonErrorResponses[400],
    422: commonErrorResponses[422],
    500: commonErrorResponses[500],
  },
});

// GET /tickets
registry.registerPath({
  method: "get",
  path: "/tickets",
  tags: ["Tickets"],
  summary: "List tickets",
  description: "Return every ticket. The order is unspecified.",
  responses: {
    200: {
      description: "All tickets",
      content: {
        "application/json": {
          schema: z.array(TicketSchema),
        },
      },
    },
    500: commonErrorResponses[500],
  },
});

// GET /tickets/{id}
registry.registerPath({
  method: "get",
  path: "/tickets/{id}",
  tags: ["Tickets"],
  summary: "Get ticket",
  request: {
    params: TicketIdParamsSchema,
  },
  responses: {
    200: ticketResponse("The ticket"),
    404: commonErrorResponses[404],
    422: commonErrorResponses[422],
    500: commonErrorResponses[500],
  },
});

// PUT /tickets/{id}
registry.registerPath({
  method: "put",
  path: "/tickets/{id}",
  tags: ["Tickets"],
  summary: "Update ticket",
  description: "Apply only the fields present in the body.",
  request: {
    params: TicketIdParamsSchema,
    body: {
      content: {
        "application/json": {
          schema: UpdateTicketRequestSchema,
        },
      },
    },
  },
  responses: {
    200: ticketResponse("The updated ticket"),
    400: commonErrorResponses[400],
    404: commonErrorResponses[404],
    422: commonErrorResponses[422],
    500: commonErrorResponses[500],
  },
});

// DELETE /tickets/{id}
registry.registerPath({
  method: "delete",
  path: "/tickets/{id}",
  tags: ["Tickets"],
  summary: "Delete ticket",
  description: "Remove a ticket and return it as it was just before removal.",
  request: {
    params: TicketIdParamsSchema,
  },
  responses: {
    200: ticketResponse("The deleted ticket"),
    404: commonErrorResponses[404],
    422: commonErrorResponses[422],
    500: commonErrorResponses[500],
  },
});
