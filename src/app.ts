import express from "express";
import { config } from "./config";
import { PermissionOracle } from "./domain/permissions";
import { buildApplicationRoutes, buildIntakeRoutes } from "./http/applicationRoutes";
import { requireStaff } from "./http/auth";
import { HttpError } from "./http/httpError";
import { buildVerificationRoutes } from "./http/verificationRoutes";
import { getLogger } from "./infra/logger";
import { ApplicationService } from "./services/applicationService";
import { WorkflowService } from "./services/workflowService";
import { VerificationService } from "./verification/verificationService";

export interface AppDependencies {
  applicationService: ApplicationService;
  workflowService: WorkflowService;
  verificationService: VerificationService;
  permissionOracle: PermissionOracle;
  internalApiKey: string;
}

const logger = getLogger({ module: "http" });

export const createApp = (deps: AppDependencies) => {
  const app = express();
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      service: config.serviceName,
      timestamp: new Date().toISOString()
    });
  });

  app.use("/verify", buildVerificationRoutes(deps.verificationService));
  app.use("/api/v1/public", buildIntakeRoutes(deps.applicationService));
  app.use(
    "/api/v1/applications",
    requireStaff(deps.permissionOracle, deps.internalApiKey),
    buildApplicationRoutes(deps.applicationService, deps.workflowService)
  );

  app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof HttpError) {
      if (error.statusCode >= 500) {
        logger.error({ err: error, method: req.method, path: req.path }, "request_failed");
      }

      res.status(error.statusCode).json({
        error: error.name,
        message: error.message
      });
      return;
    }

    logger.error({ err: error, method: req.method, path: req.path }, "unhandled_error");
    res.status(500).json({
      error: "InternalServerError",
      message: "Unexpected server error"
    });
  });

  return app;
};
