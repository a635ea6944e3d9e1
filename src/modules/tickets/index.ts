export { TICKET_NOT_FOUND, ticketsRouter } from "./tickets.routes";
export * from "./tickets.schema";
export { type TicketsService, ticketsService } from "./tickets.service";

// OpenAPI registration - importing registers routes with the registry
import "./tickets.openapi";
