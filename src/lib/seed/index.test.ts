import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Database } from "@/db";
import type { Ticket } from "@/db/schema";

vi.mock("@/modules/tickets/tickets.service", () => ({
  ticketsService: {
    listAll: vi.fn(),
    create: vi.fn(),
  },
}));

import { ticketsService } from "@/modules/tickets/tickets.service";
import { SAMPLE_TICKETS, seedTickets } from "./index";

const db = {} as Database;

describe("seedTickets", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should insert every sample into an empty table", async () => {
    vi.mocked(ticketsService.listAll).mockResolvedValue([]);
    vi.mocked(ticketsService.create).mockImplementation(async (_db, input) => ({
      id: 1,
      status: "open",
      ...input,
    }));

    const result = await seedTickets(db);

    expect(result.skipped).toBe(false);
    expect(result.tickets).toHaveLength(SAMPLE_TICKETS.length);
    expect(ticketsService.create).toHaveBeenNthCalledWith(1, db, SAMPLE_TICKETS[0]);
  });

  it("should leave a non-empty table alone", async () => {
    const existing: Ticket = { id: 5, title: "Bug", description: "Fix crash", status: "open" };
    vi.mocked(ticketsService.listAll).mockResolvedValue([existing]);

    const result = await seedTickets(db, [{ title: "Extra", description: "Not inserted" }]);

    expect(result).toEqual({ skipped: true, tickets: [] });
    expect(ticketsService.create).not.toHaveBeenCalled();
  });
});
