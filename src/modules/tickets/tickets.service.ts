/**
 * Tickets Service
 * Maps validated ticket input onto the tickets table.
 *
 * Every operation runs against the store handle it is given, so callers
 * decide how long the underlying connection lives. Absence is reported
 * as `null` rather than thrown.
 */

import { eq } from "drizzle-orm";
import type { Database } from "@/db";
import { DEFAULT_TICKET_STATUS, type NewTicket, type Ticket, tickets } from "@/db/schema";
import type { CreateTicketInput, UpdateTicketInput } from "./tickets.schema";

export interface TicketsService {
  listAll(db: Database): Promise<Ticket[]>;
  get(db: Database, id: number): Promise<Ticket | null>;
  create(db: Database, input: CreateTicketInput): Promise<Ticket>;
  update(db: Database, id: number, input: UpdateTicketInput): Promise<Ticket | null>;
  delete(db: Database, id: number): Promise<Ticket | null>;
}

// Only keys the client actually sent end up in the change set
function buildChanges(input: UpdateTicketInput): Partial<NewTicket> {
  const changes: Partial<NewTicket> = {};

  if (input.title !== undefined) {
    changes.title = input.title;
  }
  if (input.description !== undefined) {
    changes.description = input.description;
  }
  if (input.status !== undefined) {
    changes.status = input.status;
  }

  return changes;
}

export const ticketsService: TicketsService = {
  /**
   * List every ticket. No ordering is guaranteed.
   */
  async listAll(db) {
    const result = await db.select().from(tickets);

    return result;
  },

  async get(db, id) {
    const [ticket] = await db.select().from(tickets).where(eq(tickets.id, id)).limit(1);

    return ticket ?? null;
  },

  /**
   * Create a ticket. New tickets always start out open.
   */
  async create(db, input) {
    const [ticket] = await db
      .insert(tickets)
      .values({
        title: input.title,
        description: input.description,
        status: DEFAULT_TICKET_STATUS,
      })
      .returning();

    if (!ticket) {
      throw new Error("Insert into tickets returned no row");
    }

    return ticket;
  },

  /**
   * Apply the supplied fields to an existing ticket.
   * An empty update writes nothing and returns the ticket as stored.
   */
  async update(db, id, input) {
    const changes = buildChanges(input);

    if (Object.keys(changes).length === 0) {
      return ticketsService.get(db, id);
    }

    const [ticket] = await db
      .update(tickets)
      .set(changes)
      .where(eq(tickets.id, id))
      .returning();

    return ticket ?? null;
  },

  /**
   * Remove a ticket, returning it as it was just before removal.
   */
  async delete(db, id) {
    const [deleted] = await db.delete(tickets).where(eq(tickets.id, id)).returning();

    return deleted ?? null;
  },
};
