import express, { type Express, type Request, type Response, type NextFunction } from "express";
import { registerControlRoutes, registerMemberRoutes, type ControlPlaneServices } from "./routes";

const LOGGED_PREFIXES = ["/cluster", "/nodes", "/operations"];

// Response bodies that carry secrets are logged without them.
const REDACTED_FIELDS = new Set(["token", "private_key", "certificate", "ca_certificate"]);

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

export function redactBody(body: unknown): unknown {
  if (Array.isArray(body)) return body.map(redactBody);
  if (body === null || typeof body !== "object" || body instanceof Date) return body;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    out[key] = REDACTED_FIELDS.has(key) ? "[redacted]" : redactBody(value);
  }
  return out;
}

function requestLogging(source: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json;
    res.json = function (bodyJson) {
      capturedJsonResponse = bodyJson;
      return originalResJson.call(res, bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (LOGGED_PREFIXES.some((prefix) => path.startsWith(prefix))) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(redactBody(capturedJsonResponse))}`;
        }
        log(logLine, source);
      }
    });

    next();
  };
}

function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction) {
  console.error("Internal Server Error:", err);

  if (res.headersSent) {
    return next(err);
  }

  // Malformed JSON bodies arrive here from express.json().
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    return res.status(400).json({ message: "Request body is not valid JSON" });
  }
  const message = err instanceof Error && err.message ? err.message : "Internal Server Error";
  return res.status(500).json({ message });
}

export function createControlApp(services: ControlPlaneServices): Express {
  const app = express();
  app.use(express.json());
  app.use(requestLogging("express"));
  registerControlRoutes(app, services);
  app.use(errorHandler);
  return app;
}

export function createMemberApp(services: ControlPlaneServices): Express {
  const app = express();
  app.use(express.json());
  app.use(requestLogging("member-api"));
  registerMemberRoutes(app, services);
  app.use(errorHandler);
  return app;
}
