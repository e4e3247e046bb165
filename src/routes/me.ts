import { Router } from "express";
import { requireJWT } from "../middleware/requireJWT";
import type { Services } from "../services";
import { contextOf } from "./context";
import { toCollaborator, toProject, toSafeInvitation } from "./serializers";

export function meRoutes(services: Services) {
  const router = Router();

  // addressed to me by user id or by my email; the token is mine to use
  router.get("/me/invitations", requireJWT, async (req, res, next) => {
    try {
      const invitations = await services.invitations.listMine(contextOf(req));
      return res.json({ invitations: invitations.map((i) => toSafeInvitation(i, true)) });
    } catch (err) {
      next(err);
    }
  });

  router.get("/me/collaborations", requireJWT, async (req, res, next) => {
    try {
      const rows = await services.collaborators.listMine(contextOf(req));
      return res.json({
        collaborations: rows.map(({ collaborator, project }) => ({
          ...toCollaborator(collaborator),
          project: toProject(project, collaborator.role),
        })),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
