/**
 * Development Database Seed
 *
 * Usage:
 *   npm run db:seed
 */

import { checkDatabaseConnection, closeDatabaseConnection, withSession } from "./db";
import { logger } from "./lib/logger";
import { seedTickets } from "./lib/seed";

async function seed() {
  logger.info("Starting development database seed...");

  try {
    const connected = await checkDatabaseConnection();
    if (!connected) {
      throw new Error("Failed to connect to database");
    }

    const result = await withSession((session) => seedTickets(session));

    if (result.skipped) {
      logger.info("Tickets table is not empty, nothing seeded");
    } else {
      logger.info({ count: result.tickets.length }, "Seed completed successfully");
    }
  } finally {
    await closeDatabaseConnection();
  }
}

seed().catch((error: unknown) => {
  logger.fatal({ err: error }, "Seed failed");
  process.exit(1);
});
