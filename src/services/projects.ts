import { Role } from "../access/roles";
import { AccessError } from "../utils/errors";
import type { ProjectPatch, ProjectRecord } from "../store/types";
import { createAccessService } from "./access";
import type { ProjectAccess } from "./access";
import { requireActor } from "./context";
import type { RequestContext, ServiceDeps } from "./context";

export interface ProjectWithRole {
  project: ProjectRecord;
  role: Role;
}

export function createProjectService(deps: ServiceDeps) {
  const { store, events } = deps;
  const access = createAccessService(deps);

  async function create(ctx: RequestContext, name: string): Promise<ProjectRecord> {
    const actor = requireActor(deps, ctx);
    const trimmed = name.trim();
    if (!trimmed) throw new AccessError("InvalidInput", "Project name is required");

    const project = await store.createProject({ name: trimmed, ownerId: actor.id });
    ctx.log.info({ event: "project.created", projectId: project.id, ownerId: actor.id }, "project created");
    return project;
  }

  async function get(ctx: RequestContext, projectId: string): Promise<ProjectAccess> {
    return access.authorize(ctx, projectId, "view");
  }

  /** Name and active flag only; ownership never moves. */
  async function update(ctx: RequestContext, projectId: string, patch: ProjectPatch): Promise<ProjectAccess> {
    const { project, role } = await access.authorize(ctx, projectId, "edit");

    const next: ProjectPatch = {};
    if (patch.name !== undefined) {
      const trimmed = patch.name.trim();
      if (!trimmed) throw new AccessError("InvalidInput", "Project name is required");
      next.name = trimmed;
    }
    if (patch.active !== undefined) next.active = patch.active;
    if (Object.keys(next).length === 0) {
      throw new AccessError("InvalidInput", "Nothing to update");
    }

    const updated = await store.updateProject(project.id, next);
    if (!updated) throw new AccessError("NotFound", "Project not found");
    ctx.log.info({ event: "project.updated", projectId: project.id, fields: Object.keys(next) }, "project updated");
    return { project: updated, role };
  }

  async function remove(ctx: RequestContext, projectId: string): Promise<void> {
    const { project } = await access.authorize(ctx, projectId, "delete");
    const deleted = await store.deleteProject(project.id);
    if (!deleted) throw new AccessError("NotFound", "Project not found");
    ctx.log.info({ event: "project.deleted", projectId: project.id, userId: ctx.actor?.id }, "project deleted");
    events.projectDeleted(project.id);
  }

  /** Owned projects first, then the ones the caller collaborates on. */
  async function listMine(ctx: RequestContext): Promise<ProjectWithRole[]> {
    const actor = requireActor(deps, ctx);
    const [owned, rows] = await Promise.all([store.listOwnedProjects(actor.id), store.listCollaborationsOf(actor.id)]);
    const shared = await store.findProjects(rows.map((r) => r.projectId));
    const roleByProject = new Map(rows.map((r) => [r.projectId, r.role]));

    return [
      ...owned.map((project): ProjectWithRole => ({ project, role: "owner" })),
      ...shared.map((project): ProjectWithRole => ({ project, role: roleByProject.get(project.id) ?? "none" })),
    ];
  }

  return { create, get, update, remove, listMine };
}

export type ProjectService = ReturnType<typeof createProjectService>;
