/* src/utils/rbac.ts */
import { Role } from "../access/roles";

export type ProjectAction = "view" | "edit" | "delete" | "view_members" | "manage_members";

// Any collaborator may read the member list; only owner/admin may change it.
const POLICY: Record<ProjectAction, ReadonlySet<Role>> = {
  view: new Set<Role>(["owner", "admin", "contributor", "viewer"]),
  edit: new Set<Role>(["owner", "admin", "contributor"]),
  delete: new Set<Role>(["owner", "admin"]),
  view_members: new Set<Role>(["owner", "admin", "contributor", "viewer"]),
  manage_members: new Set<Role>(["owner", "admin"]),
};

export function can(role: Role, action: ProjectAction): boolean {
  return POLICY[action].has(role);
}
