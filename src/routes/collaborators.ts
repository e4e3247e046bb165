import { Router } from "express";
import { z } from "zod";
import { requireJWT } from "../middleware/requireJWT";
import { COLLABORATOR_ROLES } from "../access/roles";
import type { Services } from "../services";
import { contextOf } from "./context";
import { toCollaborator } from "./serializers";

const addCollaboratorSchema = z.object({
  userId: z.string().min(1),
  role: z.enum(COLLABORATOR_ROLES).optional().default("viewer"),
});

// anything outside the three roles (e.g. "editor") is rejected here
const changeRoleSchema = z.object({
  role: z.enum(COLLABORATOR_ROLES),
});

export function collaboratorRoutes(services: Services) {
  const router = Router();

  /** Any collaborator may read the list; the owner is reported separately. */
  router.get("/projects/:projectId/collaborators", requireJWT, async (req, res, next) => {
    try {
      const listing = await services.collaborators.list(contextOf(req), req.params.projectId);
      return res.json({
        owner: listing.owner ?? { id: listing.ownerId },
        collaborators: listing.collaborators.map((c) => ({
          ...toCollaborator(c),
          user: c.user,
        })),
      });
    } catch (err) {
      next(err);
    }
  });

  router.post("/projects/:projectId/collaborators", requireJWT, async (req, res, next) => {
    try {
      const parsed = addCollaboratorSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: { message: "Invalid body", details: parsed.error.flatten() } });
      }
      const collaborator = await services.collaborators.add(
        contextOf(req),
        req.params.projectId,
        parsed.data.userId,
        parsed.data.role
      );
      return res.status(201).json({ collaborator: toCollaborator(collaborator) });
    } catch (err) {
      next(err);
    }
  });

  router.patch("/projects/:projectId/collaborators/:collaboratorId", requireJWT, async (req, res, next) => {
    try {
      const parsed = changeRoleSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: { message: "Invalid body", details: parsed.error.flatten() } });
      }
      const collaborator = await services.collaborators.updateRole(
        contextOf(req),
        req.params.projectId,
        req.params.collaboratorId,
        parsed.data.role
      );
      return res.json({ collaborator: toCollaborator(collaborator) });
    } catch (err) {
      next(err);
    }
  });

  router.delete("/projects/:projectId/collaborators/:collaboratorId", requireJWT, async (req, res, next) => {
    try {
      await services.collaborators.remove(contextOf(req), req.params.projectId, req.params.collaboratorId);
      return res.status(204).send();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
