import type { CollaboratorRecord, InvitationRecord } from "../store/types";

/** Membership changes pushed to connected clients. */
export interface MembershipEvents {
  invitationReceived(userId: string, invitation: InvitationRecord): void;
  collaboratorAdded(projectId: string, collaborator: CollaboratorRecord): void;
  collaboratorUpdated(projectId: string, collaborator: CollaboratorRecord): void;
  collaboratorRemoved(projectId: string, collaborator: CollaboratorRecord): void;
  projectDeleted(projectId: string): void;
}

export const noopEvents: MembershipEvents = {
  invitationReceived() {},
  collaboratorAdded() {},
  collaboratorUpdated() {},
  collaboratorRemoved() {},
  projectDeleted() {},
};
