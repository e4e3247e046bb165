/** Roles a collaborator row can carry. The owner is never stored as a row. */
export const COLLABORATOR_ROLES = ["viewer", "contributor", "admin"] as const;
export type CollaboratorRole = (typeof COLLABORATOR_ROLES)[number];

/** Effective role of a user on a project. */
export type Role = "owner" | CollaboratorRole | "none";

export function isCollaboratorRole(value: unknown): value is CollaboratorRole {
  return typeof value === "string" && (COLLABORATOR_ROLES as readonly string[]).includes(value);
}
