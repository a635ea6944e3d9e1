// Database Schema - Tables

import { pgTable, serial, text } from "drizzle-orm/pg-core";

// ═══════════════════════════════════════════════════════════════════════════
// TICKETS
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_TICKET_STATUS = "open";

export const tickets = pgTable("tickets", {
  id: serial("id").primaryKey(),
  title: text("title").notNull(),
  description: text("description").notNull(),
  status: text("status").notNull().default(DEFAULT_TICKET_STATUS),
});
