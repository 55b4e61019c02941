import { Request, Response, NextFunction, RequestHandler } from "express";
import jwt from "jsonwebtoken";

export interface JWTPayload {
  userId: string;
  name?: string;
  email?: string;
}

export interface AuthenticatedRequest extends Request {
  user?: JWTPayload;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/** Bearer-token check for the API; the token must carry a userId. */
export function createJwtMiddleware(secret: string): RequestHandler {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    try {
      const authHeader = req.headers.authorization;

      if (!authHeader) {
        res.status(401).json({ success: false, error: "Authorization header missing" });
        return;
      }

      const token = authHeader.startsWith("Bearer ") ? authHeader.slice(7) : authHeader;

      if (!token) {
        res.status(401).json({ success: false, error: "Token missing" });
        return;
      }

      const decoded = jwt.verify(token, secret);

      if (typeof decoded === "string" || typeof decoded.userId !== "string" || !decoded.userId) {
        res.status(401).json({ success: false, error: "Invalid token payload" });
        return;
      }

      req.user = {
        userId: decoded.userId,
        name: optionalString(decoded.name),
        email: optionalString(decoded.email),
      };

      next();
    } catch (error: unknown) {
      // TokenExpiredError extends JsonWebTokenError, so check it first
      if (error instanceof jwt.TokenExpiredError) {
        res.status(401).json({ success: false, error: "Token expired" });
        return;
      }
      if (error instanceof jwt.JsonWebTokenError) {
        res.status(401).json({ success: false, error: "Invalid token" });
        return;
      }
      res.status(500).json({ success: false, error: "Authentication error" });
    }
  };
}
