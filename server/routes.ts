import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { isAuditError, renderReportText, type AuditService } from "./audit";
import { moduleLogger } from "./logger";

const log = moduleLogger("routes");

const AuditRequestSchema = z.object({
  url: z.string().trim().min(1, "url is required"),
});

const ReportQuerySchema = z.object({
  format: z.enum(["json", "text"]).default("json"),
});

function sendError(res: Response, error: unknown, fallback: string) {
  if (isAuditError(error)) {
    res.status(error.statusCode).json({ error: true, code: error.code, message: error.message });
    return;
  }
  log.error("request failed", { error });
  res.status(500).json({
    error: true,
    message: error instanceof Error && error.message ? error.message : fallback,
  });
}

export async function registerRoutes(httpServer: Server, app: Express, service: AuditService): Promise<Server> {
  app.post("/api/report", async (req: Request, res: Response) => {
    const body = AuditRequestSchema.safeParse(req.body);
    const query = ReportQuerySchema.safeParse(req.query);

    if (!body.success || !query.success) {
      res.status(400).json({
        error: true,
        message: "Invalid request",
        details: [...(body.error?.errors ?? []), ...(query.error?.errors ?? [])],
      });
      return;
    }

    try {
      const report = await service.report(body.data.url);
      if (query.data.format === "text") {
        res.type("text/plain").send(renderReportText(report));
        return;
      }
      res.json(report);
    } catch (error) {
      sendError(res, error, "An error occurred during the audit");
    }
  });

  app.post("/api/analyze-summary", async (req: Request, res: Response) => {
    const body = AuditRequestSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({
        error: true,
        message: "Invalid request body",
        details: body.error.errors,
      });
      return;
    }

    try {
      res.json(await service.analyzeSummary(body.data.url));
    } catch (error) {
      sendError(res, error, "An error occurred while summarizing the audit");
    }
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", service: "site-audit" });
  });

  return httpServer;
}
