import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import express from "express";
import type { ErrorRequestHandler, Express, NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError, type z } from "zod";
import { ValidationError, errorMessage, isLolqaError, type Logger } from "@lolqa/core";

/** Express 4 does not catch rejected handlers; this forwards them to the error middleware. */
export function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch((err: unknown) => next(err));
  };
}

export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  const issues = parsed.error.issues.map((i) => `${i.path.join(".") || what}: ${i.message}`);
  throw new ValidationError(`Invalid ${what}: ${issues.join("; ")}`, issues);
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

export function statusFor(err: unknown): number {
  if (err instanceof ZodError || isBodyParseError(err)) return 400;
  if (!isLolqaError(err)) return 500;
  switch (err.kind) {
    case "validation":
      return 400;
    case "not_found":
      return 404;
    case "dependency":
      return 503;
    default:
      return 500;
  }
}

/** Maps errors to `{ detail }` responses. Validation failures are the caller's and are not logged. */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const status = statusFor(err);
    const detail = isBodyParseError(err) ? "Request body is not valid JSON" : errorMessage(err);

    if (status >= 500) {
      logger.error("request failed", { method: req.method, path: req.path, status, error: detail });
    } else if (status !== 400) {
      logger.warn("request rejected", { method: req.method, path: req.path, status, error: detail });
    }

    res.status(status).json({ detail });
  };
}

export function createApp(): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "1mb" }));
  return app;
}

/** Binds `app` and resolves once it is listening. Port 0 picks a free port. */
export function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => resolve(server));
    server.once("error", reject);
  });
}

export function boundPort(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }
  const info: AddressInfo = address;
  return info.port;
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
