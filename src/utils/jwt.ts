// src/utils/jwt.ts
import jwt, { SignOptions } from "jsonwebtoken";
import crypto from "crypto";
import { z } from "zod";
import env from "../config/env";

/**
 * Access tokens are minted by the identity service; this one only verifies
 * them. `signAccessToken` exists for local tooling and tests.
 */
const accessPayloadSchema = z.object({
  id: z.string().min(1),
  email: z.string().min(1),
  name: z.string().default(""),
  jti: z.string().optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type AccessPayload = z.infer<typeof accessPayloadSchema>;

function accessSecret() {
  if (!env.JWT_ACCESS_SECRET) throw new Error("JWT_ACCESS_SECRET is not set");
  return env.JWT_ACCESS_SECRET;
}

export function newJti(bytes: number = 16) {
  return crypto.randomBytes(bytes).toString("hex");
}

export function signAccessToken(
  payload: { id: string; email: string; name: string },
  expiresIn: SignOptions["expiresIn"] = "15m"
) {
  return jwt.sign({ ...payload, jti: newJti() }, accessSecret(), { expiresIn });
}

/** Throws when the signature, expiry or payload shape is wrong. */
export function verifyAccessToken(token: string): AccessPayload {
  const decoded = jwt.verify(token, accessSecret());
  if (typeof decoded === "string") throw new Error("Unexpected token payload");
  return accessPayloadSchema.parse(decoded);
}
