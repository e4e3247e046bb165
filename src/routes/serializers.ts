import type { CollaboratorRecord, InvitationRecord, ProjectRecord } from "../store/types";
import type { Role } from "../access/roles";

export function toProject(p: ProjectRecord, role?: Role) {
  return {
    id: p.id,
    name: p.name,
    ownerId: p.ownerId,
    active: p.active,
    createdAt: p.createdAt,
    updatedAt: p.updatedAt,
    ...(role ? { role } : {}),
  };
}

export function toCollaborator(c: CollaboratorRecord) {
  return {
    id: c.id,
    projectId: c.projectId,
    userId: c.userId,
    role: c.role,
    addedAt: c.addedAt,
    addedBy: c.addedBy,
  };
}

// the token is a bearer secret; only listed when explicitly allowed (dev)
export function toSafeInvitation(i: InvitationRecord, exposeToken: boolean) {
  return {
    id: i.id,
    projectId: i.projectId,
    inviterId: i.inviterId,
    inviteeId: i.inviteeId,
    email: i.email,
    status: i.status,
    createdAt: i.createdAt,
    acceptedAt: i.acceptedAt,
    expiresAt: i.expiresAt,
    lastSentAt: i.lastSentAt,
    sendCount: i.sendCount,
    lastError: i.lastError,
    ...(exposeToken ? { token: i.token } : {}),
  };
}
