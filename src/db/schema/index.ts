// Database Schema Index
// Re-export all tables and inferred types

export * from "./tables";

import type { tickets } from "./tables";

// Ticket types
export type Ticket = typeof tickets.$inferSelect;
export type NewTicket = typeof tickets.$inferInsert;
