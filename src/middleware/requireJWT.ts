// src/middleware/requireJWT.ts
import { Request, Response, NextFunction } from "express";
import { verifyAccessToken, AccessPayload } from "../utils/jwt";
import { getRedis } from "../redis/client";
import { RKeys } from "../redis/keys";

export async function requireJWT(req: Request, res: Response, next: NextFunction) {
  const header = req.headers.authorization || "";
  const token = header.startsWith("Bearer ") ? header.slice(7) : null;
  if (!token) {
    return res.status(401).json({ error: { message: "Missing token" } });
  }

  let payload: AccessPayload;
  try {
    payload = verifyAccessToken(token);
  } catch {
    return res.status(401).json({ error: { message: "Invalid or expired token" } });
  }

  // Optional denylist by access-token jti
  if (payload.jti) {
    try {
      const blocked = await getRedis().get(RKeys.atBlock(payload.jti));
      if (blocked) {
        return res.status(401).json({ error: { message: "Token revoked" } });
      }
    } catch (err) {
      req.log.error({ err }, "token denylist lookup failed");
      return res.status(503).json({ error: { message: "Auth service unavailable" } });
    }
  }

  req.user = { id: payload.id, email: payload.email.toLowerCase(), name: payload.name };
  return next();
}
