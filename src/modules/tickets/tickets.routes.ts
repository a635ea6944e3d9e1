import { type NextFunction, type Request, type Response, Router } from "express";
import { withSession } from "@/db";
import { NotFoundError } from "@/middleware/error-handler";
import { validateRequest } from "@/middleware/validate";
import {
  type CreateTicketInput,
  createTicketSchema,
  ticketIdParamSchema,
  toTicketResponse,
  type UpdateTicketInput,
  updateTicketSchema,
} from "./tickets.schema";
import { ticketsService } from "./tickets.service";

export const TICKET_NOT_FOUND = "Ticket not found";

const router = Router();

// validateRequest has already replaced the path segment with the parsed id
function ticketIdOf(req: Request): number {
  const id: unknown = req.params.id;
  if (typeof id !== "number") {
    throw new Error("Ticket id was read before validation");
  }
  return id;
}

// ─────────────────────────────────────────────────────────────
// POST /tickets - Create ticket
// ─────────────────────────────────────────────────────────────
router.post(
  "/",
  validateRequest({ body: createTicketSchema }),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input: CreateTicketInput = req.body;
      const ticket = await withSession((session) => ticketsService.create(session, input));

      res.status(201).json(toTicketResponse(ticket));
    } catch (error) {
      next(error);
    }
  },
);

// ─────────────────────────────────────────────────────────────
// GET /tickets - List tickets
// ─────────────────────────────────────────────────────────────
router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
  try {
    const tickets = await withSession((session) => ticketsService.listAll(session));

    res.json(tickets.map(toTicketResponse));
  } catch (error) {
    next(error);
  }
});

// ─────────────────────────────────────────────────────────────
// GET /tickets/:id - Get ticket
// ─────────────────────────────────────────────────────────────
router.get(
  "/:id",
  validateRequest({ params: ticketIdParamSchema }),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = ticketIdOf(req);
      const ticket = await withSession((session) => ticketsService.get(session, id));

      if (!ticket) {
        throw new NotFoundError(TICKET_NOT_FOUND);
      }

      res.json(toTicketResponse(ticket));
    } catch (error) {
      next(error);
    }
  },
);

// ─────────────────────────────────────────────────────────────
// PUT /tickets/:id - Update ticket
// ─────────────────────────────────────────────────────────────
router.put(
  "/:id",
  validateRequest({ params: ticketIdParamSchema, body: updateTicketSchema }),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = ticketIdOf(req);
      const input: UpdateTicketInput = req.body;
      const ticket = await withSession((session) => ticketsService.update(session, id, input));

      if (!ticket) {
        throw new NotFoundError(TICKET_NOT_FOUND);
      }

      res.json(toTicketResponse(ticket));
    } catch (error) {
      next(error);
    }
  },
);

// ─────────────────────────────────────────────────────────────
// DELETE /tickets/:id - Delete ticket, answering with its last state
// ─────────────────────────────────────────────────────────────
router.delete(
  "/:id",
  validateRequest({ params: ticketIdParamSchema }),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = ticketIdOf(req);
      const ticket = await withSession((session) => ticketsService.delete(session, id));

      if (!ticket) {
        throw new NotFoundError(TICKET_NOT_FOUND);
      }

      res.json(toTicketResponse(ticket));
    } catch (error) {
      next(error);
    }
  },
);

export const ticketsRouter = router;
