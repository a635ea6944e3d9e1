/**
 * Ticket Seeding
 *
 * Fills an empty tickets table with sample data for local development.
 */

import type { Database } from "@/db";
import type { Ticket } from "@/db/schema";
import type { CreateTicketInput } from "@/modules/tickets/tickets.schema";
import { ticketsService } from "@/modules/tickets/tickets.service";

export const SAMPLE_TICKETS: CreateTicketInput[] = [
  {
    title: "Login page crashes",
    description: "Submitting the form with an empty password throws.",
  },
  {
    title: "Export button does nothing",
    description: "Clicking export on the reports page has no effect.",
  },
  {
    title: "Typo in welcome email",
    description: "The subject line reads 'Welcom'.",
  },
  {
    title: "Slow ticket list",
    description: "Listing tickets takes several seconds on large accounts.",
  },
];

export interface SeedResult {
  skipped: boolean;
  tickets: Ticket[];
}

/**
 * Insert `samples` unless the table already holds tickets.
 */
export async function seedTickets(
  db: Database,
  samples: CreateTicketInput[] = SAMPLE_TICKETS,
): Promise<SeedResult> {
  const existing = await ticketsService.listAll(db);
  if (existing.length > 0) {
    return { skipped: true, tickets: [] };
  }

  const created: Ticket[] = [];
  for (const sample of samples) {
    created.push(await ticketsService.create(db, sample));
  }

  return { skipped: false, tickets: created };
}
