import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { isAccessError } from "../utils/errors";

function isBodyParseError(err: unknown) {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

// Express recognises error middleware by its four parameters.
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (isAccessError(err)) {
    return res.status(err.status).json({ error: { code: err.kind, message: err.message } });
  }
  if (err instanceof ZodError) {
    return res.status(400).json({ error: { message: "Invalid body", details: err.flatten() } });
  }
  if (isBodyParseError(err)) {
    return res.status(400).json({ error: { message: "Malformed JSON body" } });
  }

  req.log.error({ err }, "unhandled error");
  return res.status(500).json({ error: { message: "Internal server error" } });
}
