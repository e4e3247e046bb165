import { Router } from "express";
import { z } from "zod";
import { requireJWT } from "../middleware/requireJWT";
import { rateLimit } from "../middleware/rateLimit";
import type { Services } from "../services";
import { contextOf } from "./context";
import { toCollaborator, toProject, toSafeInvitation } from "./serializers";

// recipient exclusivity is checked by the service so callers get InvalidRecipient
const createInvitationSchema = z.object({
  inviteeId: z.string().min(1).optional(),
  email: z.string().email().optional(),
  expiresAt: z.coerce.date().optional(),
});

const invitationSendLimit = rateLimit({
  windowSec: 60 * 60,
  max: 50,
  bucket: (req) => `invite:${req.user?.id ?? req.ip ?? "unknown"}`,
});

export function invitationRoutes(services: Services) {
  const router = Router();
  const safe = (i: Parameters<typeof toSafeInvitation>[0]) => toSafeInvitation(i, services.exposeTokens);

  router.get("/projects/:projectId/invitations", requireJWT, async (req, res, next) => {
    try {
      const listing = await services.invitations.list(contextOf(req), req.params.projectId);
      return res.json({
        invitations: listing.invitations.map(safe),
        pendingCount: listing.pendingCount,
        acceptedCount: listing.acceptedCount,
      });
    } catch (err) {
      next(err);
    }
  });

  router.post("/projects/:projectId/invitations", requireJWT, invitationSendLimit, async (req, res, next) => {
    try {
      const parsed = createInvitationSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: { message: "Invalid body", details: parsed.error.flatten() } });
      }
      const { invitation, warnings } = await services.invitations.create(
        contextOf(req),
        req.params.projectId,
        parsed.data
      );
      return res.status(201).json({ invitation: safe(invitation), warnings });
    } catch (err) {
      next(err);
    }
  });

  router.post("/projects/:projectId/invitations/:invitationId/cancel", requireJWT, async (req, res, next) => {
    try {
      const invitation = await services.invitations.cancel(
        contextOf(req),
        req.params.projectId,
        req.params.invitationId
      );
      return res.json({ invitation: safe(invitation) });
    } catch (err) {
      next(err);
    }
  });

  router.post(
    "/projects/:projectId/invitations/:invitationId/resend",
    requireJWT,
    invitationSendLimit,
    async (req, res, next) => {
      try {
        const { invitation, warnings } = await services.invitations.resend(
          contextOf(req),
          req.params.projectId,
          req.params.invitationId
        );
        return res.json({ invitation: safe(invitation), warnings });
      } catch (err) {
        next(err);
      }
    }
  );

  router.post("/invitations/:token/accept", requireJWT, async (req, res, next) => {
    try {
      const { invitation, collaborator, project } = await services.invitations.accept(contextOf(req), req.params.token);
      return res.status(201).json({
        invitation: safe(invitation),
        collaborator: toCollaborator(collaborator),
        project: toProject(project, collaborator.role),
      });
    } catch (err) {
      next(err);
    }
  });

  router.post("/invitations/:token/decline", requireJWT, async (req, res, next) => {
    try {
      const invitation = await services.invitations.decline(contextOf(req), req.params.token);
      return res.json({ invitation: safe(invitation) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
