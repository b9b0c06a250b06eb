import { NextFunction, Request, RequestHandler, Response } from "express";
import { AuthorizationContext, PermissionOracle } from "../domain/permissions";
import { HttpError } from "./httpError";

declare global {
  namespace Express {
    interface Request {
      auth?: AuthorizationContext;
    }
  }
}

const headerValue = (req: Request, name: string): string => {
  const value = req.headers[name];
  return (Array.isArray(value) ? value[0] : value ?? "").trim();
};

/**
 * Staff routes are only reachable through the back office: a shared bearer key, plus the
 * actor id and role it forwards in `x-actor-id` / `x-actor-role`.
 */
export const requireStaff = (oracle: PermissionOracle, internalApiKey: string): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!internalApiKey) {
      res.status(500).json({ error: "InternalServerError", message: "Missing INTERNAL_API_KEY on server" });
      return;
    }

    if (req.headers.authorization !== `Bearer ${internalApiKey}`) {
      res.status(401).json({ error: "Unauthorized", message: "Unauthorized (back office only)" });
      return;
    }

    const auth = oracle.resolve(headerValue(req, "x-actor-id"), headerValue(req, "x-actor-role"));
    if (!auth) {
      res.status(401).json({ error: "Unauthorized", message: "Unknown staff actor or role" });
      return;
    }

    req.auth = auth;
    next();
  };
};

export const authOf = (req: Request): AuthorizationContext => {
  if (!req.auth) {
    throw new HttpError(401, "Missing staff authorization context.");
  }

  return req.auth;
};
