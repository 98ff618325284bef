import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { User } from "@shared/schema";
import { AppError, ErrorCode } from "./error-handling";
import type { IStorage } from "./storage";

declare global {
  namespace Express {
    interface Request {
      user?: User;
    }
  }
}

// Set by the session gateway in front of this service
export const USER_ID_HEADER = "x-user-id";

/**
 * Resolves the forwarded user id to a user. Unknown or missing ids leave
 * the request anonymous.
 */
export function attachUser(storage: IStorage): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    const raw = req.header(USER_ID_HEADER);
    const id = raw ? Number.parseInt(raw, 10) : NaN;
    if (!Number.isInteger(id) || id <= 0) {
      next();
      return;
    }

    try {
      req.user = await storage.getUser(id);
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function requireAuth(req: Request, _res: Response, next: NextFunction): void {
  if (!req.user) {
    next(new AppError(ErrorCode.UNAUTHORIZED));
    return;
  }
  next();
}

export function requireAdmin(req: Request, _res: Response, next: NextFunction): void {
  if (!req.user) {
    next(new AppError(ErrorCode.UNAUTHORIZED));
    return;
  }
  if (!req.user.isAdmin) {
    next(new AppError(ErrorCode.FORBIDDEN));
    return;
  }
  next();
}

export function currentUserId(req: Request): number | null {
  return req.user?.id ?? null;
}
