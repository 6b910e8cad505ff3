import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import { AppError, ErrorCode, type ApiError } from "./lib/errors.js";
import { createGdpRouter, type GdpRouterOptions } from "./routes/gdp.js";

export type AppOptions = GdpRouterOptions & {
  frontendOrigin?: string;
};

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      console.error(`[app] ${err.name}: ${err.message}`, err.details ?? "");
    }
    res.status(err.statusCode).json(err.toApiError());
    return;
  }
  console.error("[app] Unhandled error", err);
  const body: ApiError = {
    error: { code: ErrorCode.INTERNAL_ERROR, message: "Internal server error" },
  };
  res.status(500).json(body);
}

export function createApp(options: AppOptions) {
  const app = express();
  app.use(cors({ origin: options.frontendOrigin ?? "*" }));
  app.use(express.json());

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.use("/api/gdp", createGdpRouter(options));
  app.use(errorHandler);
  return app;
}
