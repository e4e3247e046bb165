import type { CollabStore, CollaboratorRecord, ProjectRecord } from "../store/types";
import type { AuthUser, UserDirectory } from "../directory/users";
import { Role } from "./roles";

/**
 * Effective role from an explicit snapshot: the project and the caller's
 * collaborator row (or null). `userId` is null for anonymous callers.
 */
export function computeRole(
  project: Pick<ProjectRecord, "id" | "ownerId">,
  userId: string | null,
  collaborator: Pick<CollaboratorRecord, "projectId" | "userId" | "role"> | null
): Role {
  if (!userId) return "none";
  if (userId === project.ownerId) return "owner";
  if (collaborator && collaborator.projectId === project.id && collaborator.userId === userId) {
    return collaborator.role;
  }
  return "none";
}

/** Reads the caller's collaborator row on every call; nothing is cached. */
export async function resolveRole(
  deps: { store: CollabStore; directory: UserDirectory },
  project: ProjectRecord,
  user: AuthUser | null | undefined
): Promise<Role> {
  if (!deps.directory.isAuthenticated(user)) return "none";
  if (user.id === project.ownerId) return "owner";
  const row = await deps.store.findCollaborator(project.id, user.id);
  return computeRole(project, user.id, row);
}
