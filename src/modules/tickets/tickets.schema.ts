import { z } from "zod";
import type { Ticket } from "@/db/schema";

// PostgreSQL `integer` bounds; the `serial` id column cannot hold anything wider
const PG_INT_MIN = -2147483648;
const PG_INT_MAX = 2147483647;

const text = (label: string) =>
  z.string({
    error: (issue) =>
      issue.input === undefined ? `${label} is required` : `${label} must be a string`,
  });

// Create ticket schema
export const createTicketSchema = z.object({
  title: text("Title"),
  description: text("Description"),
});

// Update ticket schema - only keys present in the body are applied, empty strings included
export const updateTicketSchema = z.object({
  title: text("Title").optional(),
  description: text("Description").optional(),
  status: text("Status").optional(),
});

// Decimal digits only; hex, exponent and padded forms are not ids
export const TICKET_ID_PATTERN = /^-?\d+$/;

// Ticket ID param schema
export const ticketIdParamSchema = z.object({
  id: z
    .string()
    .regex(TICKET_ID_PATTERN, "Ticket id must be an integer")
    .transform(Number)
    .pipe(
      z
        .number({ error: "Ticket id is out of range" })
        .min(PG_INT_MIN, "Ticket id is out of range")
        .max(PG_INT_MAX, "Ticket id is out of range"),
    ),
});

// Serialized ticket
export const ticketResponseSchema = z.object({
  id: z.int(),
  title: z.string(),
  description: z.string(),
  status: z.string(),
});

// Types
export type CreateTicketInput = z.infer<typeof createTicketSchema>;
export type UpdateTicketInput = z.infer<typeof updateTicketSchema>;
export type TicketResponse = z.infer<typeof ticketResponseSchema>;

export function toTicketResponse(ticket: Ticket): TicketResponse {
  return {
    id: ticket.id,
    title: ticket.title,
    description: ticket.description,
    status: ticket.status,
  };
}
