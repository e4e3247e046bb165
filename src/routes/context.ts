import { Request } from "express";
import type { RequestContext } from "../services/context";

export function contextOf(req: Request): RequestContext {
  return { actor: req.user ?? null, log: req.log };
}
