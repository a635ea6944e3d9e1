import compression from "compression";
import cors from "cors";
import express, { type Express } from "express";
import helmet from "helmet";
import swaggerUi from "swagger-ui-express";
import { config, isApiDocsEnabled } from "./config";
import { httpLogger } from "./lib/logger";
import { generateOpenAPIDocument } from "./lib/openapi";
import { errorHandler, notFoundHandler } from "./middleware/error-handler";

// Import routes (these also register their OpenAPI definitions)
import { ticketsRouter } from "./modules/tickets";

export function createApp(): Express {
  const app = express();

  // ─────────────────────────────────────────────────────────────
  // Security middleware
  // ─────────────────────────────────────────────────────────────
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          scriptSrc: ["'self'", "'unsafe-inline'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          imgSrc: ["'self'", "data:", "https:"],
        },
      },
      crossOriginEmbedderPolicy: false,
    }),
  );

  app.use(
    cors({
      origin: config.FRONTEND_URL,
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
    }),
  );

  // ─────────────────────────────────────────────────────────────
  // Body parsing and compression
  // ─────────────────────────────────────────────────────────────
  app.use(express.json({ limit: "1mb" }));
  app.use(compression());

  // ─────────────────────────────────────────────────────────────
  // Request logging
  // ─────────────────────────────────────────────────────────────
  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      httpLogger.info({
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        duration: `${Date.now() - start}ms`,
      });
    });
    next();
  });

  // ─────────────────────────────────────────────────────────────
  // Health check
  // ─────────────────────────────────────────────────────────────
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || "1.0.0",
    });
  });

  // ─────────────────────────────────────────────────────────────
  // API Documentation (Swagger UI) - Conditionally enabled
  // ─────────────────────────────────────────────────────────────
  if (isApiDocsEnabled) {
    const openapiSpec = generateOpenAPIDocument();

    app.get("/api/docs/openapi.json", (_req, res) => {
      res.json(openapiSpec);
    });

    app.use(
      config.API_DOCS_PATH,
      swaggerUi.serve,
      swaggerUi.setup(openapiSpec, {
        customCss: ".swagger-ui .topbar { display: none }",
        customSiteTitle: "Ticket Tracker API Documentation",
      }),
    );
  }

  // ─────────────────────────────────────────────────────────────
  // API Routes
  // ─────────────────────────────────────────────────────────────
  app.use("/tickets", ticketsRouter);

  // ─────────────────────────────────────────────────────────────
  // Error handling
  // ─────────────────────────────────────────────────────────────
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
