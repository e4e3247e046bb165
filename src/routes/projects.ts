import { Router } from 'express';
import { z } from 'zod';
import { requireJWT } from '../middleware/requireJWT';
import type { Services } from '../services';
import { contextOf } from './context';
import { toProject } from './serializers';

const createProjectSchema = z.object({
  name: z.string().trim().min(1).max(100),
});

// strict: the owner is fixed at creation and cannot be patched
const updateProjectSchema = z
  .object({
    name: z.string().trim().min(1).max(100).optional(),
    active: z.boolean().optional(),
  })
  .strict();

export function projectRoutes(services: Services) {
  const router = Router();

  router.post('/projects', requireJWT, async (req, res, next) => {
    try {
      const parsed = createProjectSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: { message: 'Invalid body', details: parsed.error.flatten() } });
      }
      const project = await services.projects.create(contextOf(req), parsed.data.name);
      return res.status(201).json({ project: toProject(project, 'owner') });
    } catch (err) {
      next(err);
    }
  });

  router.get('/projects', requireJWT, async (req, res, next) => {
    try {
      const projects = await services.projects.listMine(contextOf(req));
      return res.json({ projects: projects.map(({ project, role }) => toProject(project, role)) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/projects/:projectId', requireJWT, async (req, res, next) => {
    try {
      const { project, role } = await services.projects.get(contextOf(req), req.params.projectId);
      return res.json({ project: toProject(project, role) });
    } catch (err) {
      next(err);
    }
  });

  router.patch('/projects/:projectId', requireJWT, async (req, res, next) => {
    try {
      const parsed = updateProjectSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: { message: 'Invalid body', details: parsed.error.flatten() } });
      }
      const { project, role } = await services.projects.update(contextOf(req), req.params.projectId, parsed.data);
      return res.json({ project: toProject(project, role) });
    } catch (err) {
      next(err);
    }
  });

  // cascades collaborators and invitations
  router.delete('/projects/:projectId', requireJWT, async (req, res, next) => {
    try {
      await services.projects.remove(contextOf(req), req.params.projectId);
      return res.status(204).send();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
