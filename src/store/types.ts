import type { CollaboratorRole } from "../access/roles";
import type { InvitationStatus, TerminalStatus } from "../access/invitationStatus";

export interface ProjectRecord {
  id: string;
  name: string;
  ownerId: string;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface CollaboratorRecord {
  id: string;
  projectId: string;
  userId: string;
  role: CollaboratorRole;
  addedAt: Date;
  addedBy: string | null;
}

export interface InvitationRecord {
  id: string;
  projectId: string;
  inviterId: string;
  inviteeId: string | null;
  email: string | null;
  token: string;
  status: InvitationStatus;
  createdAt: Date;
  acceptedAt: Date | null;
  expiresAt: Date;
  lastSentAt: Date | null;
  sendCount: number;
  lastError: string | null;
}

/** Exactly one way of addressing the person being invited. */
export type InvitationRecipient = { inviteeId: string; email?: undefined } | { email: string; inviteeId?: undefined };

export interface NewProject {
  name: string;
  ownerId: string;
}

export interface ProjectPatch {
  name?: string;
  active?: boolean;
}

export interface NewCollaborator {
  projectId: string;
  userId: string;
  role: CollaboratorRole;
  addedBy: string | null;
  addedAt: Date;
}

export type NewInvitation = {
  projectId: string;
  inviterId: string;
  token: string;
  createdAt: Date;
  expiresAt: Date;
} & InvitationRecipient;

export interface AcceptInvitationInput {
  userId: string;
  /** Accepting user's address; pending invitations sent to it are cancelled. */
  email: string;
  at: Date;
  role: CollaboratorRole;
  addedBy: string | null;
}

/**
 * Persistence port for projects, collaborators and invitations.
 *
 * Lookups resolve to `null` when nothing matches. Writes that would break a
 * uniqueness rule reject with an `AccessError` (`DuplicateCollaborator`,
 * `DuplicatePending`); implementations must enforce those at the storage
 * layer, not by a read before the write. Invitation transitions are
 * conditional on the row still being `pending` and resolve to `null` when it
 * no longer is.
 */
export interface CollabStore {
  findProject(id: string): Promise<ProjectRecord | null>;
  findProjects(ids: string[]): Promise<ProjectRecord[]>;
  listOwnedProjects(ownerId: string): Promise<ProjectRecord[]>;
  createProject(input: NewProject): Promise<ProjectRecord>;
  updateProject(id: string, patch: ProjectPatch): Promise<ProjectRecord | null>;
  /** Removes the project with its collaborators and invitations, all or nothing. */
  deleteProject(id: string): Promise<boolean>;

  findCollaborator(projectId: string, userId: string): Promise<CollaboratorRecord | null>;
  findCollaboratorById(id: string): Promise<CollaboratorRecord | null>;
  insertCollaborator(input: NewCollaborator): Promise<CollaboratorRecord>;
  updateCollaboratorRole(id: string, role: CollaboratorRole): Promise<CollaboratorRecord | null>;
  deleteCollaborator(id: string): Promise<boolean>;
  /** Most recently added first. */
  listCollaborators(projectId: string): Promise<CollaboratorRecord[]>;
  listCollaborationsOf(userId: string): Promise<CollaboratorRecord[]>;

  findInvitationById(id: string): Promise<InvitationRecord | null>;
  findInvitationByToken(token: string): Promise<InvitationRecord | null>;
  findPendingInvitation(projectId: string, recipient: InvitationRecipient): Promise<InvitationRecord | null>;
  insertInvitation(input: NewInvitation): Promise<InvitationRecord>;
  transitionInvitation(
    id: string,
    to: Exclude<TerminalStatus, "accepted">
  ): Promise<InvitationRecord | null>;
  /**
   * Marks the invitation accepted, binds the invitee, creates the collaborator
   * row and cancels the user's other pending invitations to the same project,
   * as one unit. Either all writes land or none does.
   */
  acceptInvitation(
    id: string,
    input: AcceptInvitationInput
  ): Promise<{ invitation: InvitationRecord; collaborator: CollaboratorRecord } | null>;
  extendInvitation(id: string, expiresAt: Date): Promise<InvitationRecord | null>;
  recordDelivery(id: string, outcome: { at: Date; error: string | null }): Promise<InvitationRecord | null>;
  /** Newest first. */
  listInvitations(projectId: string): Promise<InvitationRecord[]>;
  listPendingInvitationsFor(recipient: { userId: string; email: string }): Promise<InvitationRecord[]>;
}
