/**
 * Tickets Routes Integration Tests
 *
 * HTTP-level tests against the real app and router. The Drizzle-backed
 * service is swapped for an in-memory one and store sessions are stubbed.
 */

import type { Express } from "express";
import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ticketResponseSchema } from "@/modules/tickets/tickets.schema";
import { inMemoryTicketsService, memoryTicketStore } from "@/test/in-memory-tickets";

vi.mock("@/db", () => ({
  withSession: vi.fn(async (work: (session: unknown) => Promise<unknown>) => work({})),
}));

vi.mock("@/modules/tickets/tickets.service", async () => {
  const { inMemoryTicketsService } = await import("@/test/in-memory-tickets");
  return { ticketsService: inMemoryTicketsService };
});

import { createApp } from "@/app";
import { withSession } from "@/db";

const NOT_FOUND_BODY = { detail: "Ticket not found" };

describe("tickets routes", () => {
  let app: Express;

  beforeEach(() => {
    vi.clearAllMocks();
    memoryTicketStore.reset();
    app = createApp();
  });

  async function createTicket(title = "Bug", description = "Fix crash") {
    const response = await request(app).post("/tickets/").send({ title, description });
    expect(response.status).toBe(201);
    return response.body;
  }

  // ─────────────────────────────────────────────────────────────
  // POST /tickets
  // ─────────────────────────────────────────────────────────────

  describe("POST /tickets/", () => {
    it("should create an open ticket", async () => {
      const response = await request(app)
        .post("/tickets/")
        .send({ title: "Bug", description: "Fix crash" });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        id: 1,
        title: "Bug",
        description: "Fix crash",
        status: "open",
      });
    });

    it("should ignore a client-supplied status and id", async () => {
      const response = await request(app)
        .post("/tickets")
        .send({ id: 99, title: "Bug", description: "Fix crash", status: "closed" });

      expect(response.status).toBe(201);
      expect(response.body.id).toBe(1);
      expect(response.body.status).toBe("open");
    });

    it("should reject a body missing description", async () => {
      const create = vi.spyOn(inMemoryTicketsService, "create");

      const response = await request(app).post("/tickets/").send({ title: "Bug" });

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        detail: [{ field: "description", message: "Description is required" }],
      });
      expect(create).not.toHaveBeenCalled();
      expect(memoryTicketStore.size()).toBe(0);
    });

    it("should reject a body missing both fields", async () => {
      const response = await request(app).post("/tickets/").send({});

      expect(response.status).toBe(422);
      expect(response.body.detail).toEqual([
        { field: "title", message: "Title is required" },
        { field: "description", message: "Description is required" },
      ]);
    });

    it("should reject malformed JSON", async () => {
      const response = await request(app)
        .post("/tickets/")
        .set("Content-Type", "application/json")
        .send('{"title": "Bug",');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ detail: "Malformed JSON body" });
    });

    it("should answer a body over the size limit with 413", async () => {
      const response = await request(app)
        .post("/tickets/")
        .send({ title: "Bug", description: "x".repeat(1_100_000) });

      expect(response.status).toBe(413);
      expect(response.body).toEqual({ detail: "Request body too large" });
      expect(memoryTicketStore.size()).toBe(0);
    });

    it("should accept empty title and description", async () => {
      const response = await request(app).post("/tickets/").send({ title: "", description: "" });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({ id: 1, title: "", description: "", status: "open" });
    });
  });

  // ─────────────────────────────────────────────────────────────
  // GET /tickets
  // ─────────────────────────────────────────────────────────────

  describe("GET /tickets/", () => {
    it("should return an empty list when there are no tickets", async () => {
      const response = await request(app).get("/tickets/");

      expect(response.status).toBe(200);
      expect(response.body).toEqual([]);
    });

    it("should return every ticket in the output shape", async () => {
      await createTicket("Bug", "Fix crash");
      await createTicket("Feature", "Add export");

      const response = await request(app).get("/tickets");

      expect(response.status).toBe(200);
      expect(response.body).toHaveLength(2);
      for (const item of response.body) {
        expect(ticketResponseSchema.safeParse(item).success).toBe(true);
      }
    });
  });

  // ─────────────────────────────────────────────────────────────
  // GET /tickets/:id
  // ─────────────────────────────────────────────────────────────

  describe("GET /tickets/:id", () => {
    it("should return the created ticket", async () => {
      const created = await createTicket();

      const response = await request(app).get(`/tickets/${created.id}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual(created);
    });

    it("should return 404 for a nonexistent ticket", async () => {
      const response = await request(app).get("/tickets/999");

      expect(response.status).toBe(404);
      expect(response.body).toEqual(NOT_FOUND_BODY);
    });

    it("should reject a non-integer id", async () => {
      const response = await request(app).get("/tickets/abc");

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        detail: [{ field: "id", message: "Ticket id must be an integer" }],
      });
    });

    it.each(["0x1", "1e0", "1.0", "%201", "0b1"])(
      "should not resolve %s to an existing ticket",
      async (path) => {
        await createTicket();

        const response = await request(app).get(`/tickets/${path}`);

        expect(response.status).toBe(422);
        expect(response.body).toEqual({
          detail: [{ field: "id", message: "Ticket id must be an integer" }],
        });
      },
    );

    it("should reject an id outside the integer column range", async () => {
      const response = await request(app).get("/tickets/2147483648");

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        detail: [{ field: "id", message: "Ticket id is out of range" }],
      });
    });
  });

  // ─────────────────────────────────────────────────────────────
  // PUT /tickets/:id
  // ─────────────────────────────────────────────────────────────

  describe("PUT /tickets/:id", () => {
    it("should update status and leave other fields unchanged", async () => {
      const created = await createTicket();

      const response = await request(app).put(`/tickets/${created.id}`).send({ status: "closed" });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        id: created.id,
        title: "Bug",
        description: "Fix crash",
        status: "closed",
      });
    });

    it("should persist the update", async () => {
      const created = await createTicket();
      await request(app).put(`/tickets/${created.id}`).send({ title: "Crash on start" });

      const response = await request(app).get(`/tickets/${created.id}`);

      expect(response.body.title).toBe("Crash on start");
      expect(response.body.description).toBe("Fix crash");
    });

    it("should change nothing for an empty body", async () => {
      const created = await createTicket();

      const response = await request(app).put(`/tickets/${created.id}`).send({});

      expect(response.status).toBe(200);
      expect(response.body).toEqual(created);
    });

    it("should apply an explicitly empty status", async () => {
      const created = await createTicket();

      const response = await request(app).put(`/tickets/${created.id}`).send({ status: "" });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ ...created, status: "" });
    });

    it("should not update through a hex id", async () => {
      const created = await createTicket();

      const response = await request(app).put("/tickets/0x1").send({ status: "closed" });

      expect(response.status).toBe(422);
      const stored = await request(app).get(`/tickets/${created.id}`);
      expect(stored.body.status).toBe("open");
    });

    it("should reject null for a field", async () => {
      const created = await createTicket();

      const response = await request(app).put(`/tickets/${created.id}`).send({ title: null });

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        detail: [{ field: "title", message: "Title must be a string" }],
      });
    });

    it("should return 404 for a nonexistent ticket", async () => {
      const response = await request(app).put("/tickets/999").send({ status: "closed" });

      expect(response.status).toBe(404);
      expect(response.body).toEqual(NOT_FOUND_BODY);
    });
  });

  // ─────────────────────────────────────────────────────────────
  // DELETE /tickets/:id
  // ─────────────────────────────────────────────────────────────

  describe("DELETE /tickets/:id", () => {
    it("should return the deleted ticket once", async () => {
      const created = await createTicket();

      const response = await request(app).delete(`/tickets/${created.id}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual(created);

      const again = await request(app).delete(`/tickets/${created.id}`);
      expect(again.status).toBe(404);
      expect(again.body).toEqual(NOT_FOUND_BODY);
    });

    it("should make the ticket unreachable", async () => {
      const created = await createTicket();
      await request(app).delete(`/tickets/${created.id}`);

      const response = await request(app).get(`/tickets/${created.id}`);

      expect(response.status).toBe(404);
      expect(response.body).toEqual(NOT_FOUND_BODY);
    });

    it("should not delete through a binary or exponent id", async () => {
      const created = await createTicket();

      const binary = await request(app).delete("/tickets/0b1");
      const exponent = await request(app).delete("/tickets/1e0");

      expect(binary.status).toBe(422);
      expect(exponent.status).toBe(422);
      expect(memoryTicketStore.size()).toBe(1);
      const stored = await request(app).get(`/tickets/${created.id}`);
      expect(stored.status).toBe(200);
    });

    it("should not reuse the id of a deleted ticket", async () => {
      const first = await createTicket();
      await request(app).delete(`/tickets/${first.id}`);

      const second = await createTicket("Another", "Different");

      expect(second.id).toBe(first.id + 1);
    });

    it("should return 404 for a nonexistent ticket", async () => {
      const response = await request(app).delete("/tickets/999");

      expect(response.status).toBe(404);
      expect(response.body).toEqual(NOT_FOUND_BODY);
    });
  });

  // ─────────────────────────────────────────────────────────────
  // Store sessions and failures
  // ─────────────────────────────────────────────────────────────

  describe("store sessions", () => {
    it("should acquire one session per request", async () => {
      await request(app).get("/tickets/");

      expect(withSession).toHaveBeenCalledTimes(1);
    });

    it("should not acquire a session for rejected input", async () => {
      await request(app).post("/tickets/").send({ title: "Bug" });

      expect(withSession).not.toHaveBeenCalled();
    });

    it("should answer 500 without leaking store errors", async () => {
      vi.spyOn(inMemoryTicketsService, "listAll").mockRejectedValueOnce(
        new Error("connection refused"),
      );

      const response = await request(app).get("/tickets/");

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ detail: "Internal server error" });
    });
  });

  // ─────────────────────────────────────────────────────────────
  // Operational endpoints
  // ─────────────────────────────────────────────────────────────

  describe("operational endpoints", () => {
    it("should report health", async () => {
      const response = await request(app).get("/health");

      expect(response.status).toBe(200);
      expect(response.body.status).toBe("ok");
    });

    it("should serve the OpenAPI document with ticket paths", async () => {
      const response = await request(app).get("/api/docs/openapi.json");

      expect(response.status).toBe(200);
      expect(Object.keys(response.body.paths).sort()).toEqual(["/tickets", "/tickets/{id}"]);
    });

    it("should return 404 for unknown routes", async () => {
      const response = await request(app).get("/nope");

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ detail: "Route GET /nope not found" });
    });
  });
});
