import { isCollaboratorRole } from "../access/roles";
import type { CollaboratorRole } from "../access/roles";
import { AccessError } from "../utils/errors";
import type { DirectoryUser } from "../directory/users";
import type { CollaboratorRecord, ProjectRecord } from "../store/types";
import { createAccessService } from "./access";
import { requireActor } from "./context";
import type { RequestContext, ServiceDeps } from "./context";

export interface CollaboratorView extends CollaboratorRecord {
  user: DirectoryUser | null;
}

export interface CollaboratorListing {
  owner: DirectoryUser | null;
  ownerId: string;
  collaborators: CollaboratorView[];
}

export interface Collaboration {
  collaborator: CollaboratorRecord;
  project: ProjectRecord;
}

function assertRole(role: unknown): asserts role is CollaboratorRole {
  if (!isCollaboratorRole(role)) {
    throw new AccessError("InvalidInput", "Role must be one of viewer, contributor, admin");
  }
}

export function createCollaboratorService(deps: ServiceDeps) {
  const { store, directory, events, clock } = deps;
  const access = createAccessService(deps);

  async function loadTarget(projectId: string, collaboratorId: string) {
    const collaborator = await store.findCollaboratorById(collaboratorId);
    if (!collaborator || collaborator.projectId !== projectId) {
      throw new AccessError("NotFound", "Collaborator not found");
    }
    return collaborator;
  }

  /** Direct grant, bypassing the invitation flow. */
  async function add(ctx: RequestContext, projectId: string, userId: string, role: unknown): Promise<CollaboratorRecord> {
    const actor = requireActor(deps, ctx);
    const { project } = await access.authorize(ctx, projectId, "manage_members");
    assertRole(role);

    const user = await directory.findById(userId);
    if (!user) throw new AccessError("NotFound", "User not found");
    if (user.id === project.ownerId) {
      throw new AccessError("OwnerConflict", "The project owner cannot be added as a collaborator");
    }

    const collaborator = await store.insertCollaborator({
      projectId: project.id,
      userId: user.id,
      role,
      addedBy: actor.id,
      addedAt: clock(),
    });
    ctx.log.info(
      { event: "collaborator.added", projectId: project.id, userId: user.id, role, by: actor.id },
      "collaborator added"
    );
    events.collaboratorAdded(project.id, collaborator);
    return collaborator;
  }

  async function updateRole(
    ctx: RequestContext,
    projectId: string,
    collaboratorId: string,
    role: unknown
  ): Promise<CollaboratorRecord> {
    const actor = requireActor(deps, ctx);
    const { project } = await access.authorize(ctx, projectId, "manage_members");
    assertRole(role);

    const target = await loadTarget(project.id, collaboratorId);
    if (target.userId === project.ownerId) {
      throw new AccessError("OwnerConflict", "The project owner's role cannot be changed");
    }

    const updated = await store.updateCollaboratorRole(target.id, role);
    if (!updated) throw new AccessError("NotFound", "Collaborator not found");
    ctx.log.info(
      { event: "collaborator.role_changed", projectId: project.id, userId: updated.userId, from: target.role, to: role, by: actor.id },
      "collaborator role changed"
    );
    events.collaboratorUpdated(project.id, updated);
    return updated;
  }

  async function remove(ctx: RequestContext, projectId: string, collaboratorId: string): Promise<void> {
    const actor = requireActor(deps, ctx);
    const { project } = await access.authorize(ctx, projectId, "manage_members");

    const target = await loadTarget(project.id, collaboratorId);
    if (target.userId === project.ownerId) {
      throw new AccessError("OwnerConflict", "The project owner cannot be removed");
    }

    const removed = await store.deleteCollaborator(target.id);
    if (!removed) throw new AccessError("NotFound", "Collaborator not found");
    ctx.log.info(
      { event: "collaborator.removed", projectId: project.id, userId: target.userId, by: actor.id },
      "collaborator removed"
    );
    events.collaboratorRemoved(project.id, target);
  }

  async function list(ctx: RequestContext, projectId: string): Promise<CollaboratorListing> {
    const { project } = await access.authorize(ctx, projectId, "view_members");
    const rows = await store.listCollaborators(project.id);
    const [owner, users] = await Promise.all([
      directory.findById(project.ownerId),
      Promise.all(rows.map((row) => directory.findById(row.userId))),
    ]);
    return {
      owner,
      ownerId: project.ownerId,
      collaborators: rows.map((row, i) => ({ ...row, user: users[i] ?? null })),
    };
  }

  async function listMine(ctx: RequestContext): Promise<Collaboration[]> {
    const actor = requireActor(deps, ctx);
    const rows = await store.listCollaborationsOf(actor.id);
    const projects = await store.findProjects(rows.map((r) => r.projectId));
    const byId = new Map(projects.map((p) => [p.id, p]));
    const out: Collaboration[] = [];
    for (const collaborator of rows) {
      const project = byId.get(collaborator.projectId);
      if (project) out.push({ collaborator, project });
    }
    return out;
  }

  return { add, updateRole, remove, list, listMine };
}

export type CollaboratorService = ReturnType<typeof createCollaboratorService>;
