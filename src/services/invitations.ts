import crypto from "crypto";
import { can } from "../utils/rbac";
import { AccessError } from "../utils/errors";
import { normalizeEmail } from "../directory/users";
import type { DirectoryUser } from "../directory/users";
import { inviteUrlFor } from "../mailer/notifier";
import { isTerminal } from "../access/invitationStatus";
import { createAccessService } from "./access";
import { requireActor } from "./context";
import type { RequestContext, ServiceDeps } from "./context";
import type {
  CollaboratorRecord,
  InvitationRecipient,
  InvitationRecord,
  ProjectRecord,
} from "../store/types";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CreateInvitationInput {
  inviteeId?: string | null;
  email?: string | null;
  expiresAt?: Date | null;
}

/** Result of an operation that mails the recipient; mail trouble lands in `warnings`. */
export interface DeliveredInvitation {
  invitation: InvitationRecord;
  warnings: string[];
}

export interface AcceptedInvitation {
  invitation: InvitationRecord;
  collaborator: CollaboratorRecord;
  project: ProjectRecord;
}

export interface InvitationListing {
  invitations: InvitationRecord[];
  pendingCount: number;
  acceptedCount: number;
}

function newInvitationToken() {
  return crypto.randomBytes(32).toString("hex");
}

function assertPending(invitation: InvitationRecord) {
  if (isTerminal(invitation.status)) {
    throw new AccessError("InvalidState", `Invitation is already ${invitation.status}`);
  }
}

function hasText(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function createInvitationService(deps: ServiceDeps) {
  const { store, directory, notifier, events, clock } = deps;
  const access = createAccessService(deps);

  const expiryFrom = (from: Date) => new Date(from.getTime() + deps.inviteTtlDays * DAY_MS);

  async function recipientAddress(invitation: InvitationRecord): Promise<string | null> {
    if (invitation.email) return invitation.email;
    if (!invitation.inviteeId) return null;
    const user = await directory.findById(invitation.inviteeId);
    return user?.email ?? null;
  }

  /** Send the invitation mail and record the attempt. Never rejects on delivery trouble. */
  async function deliver(
    ctx: RequestContext,
    invitation: InvitationRecord,
    project: ProjectRecord,
    inviterName: string
  ): Promise<{ invitation: InvitationRecord; warnings: string[] }> {
    const to = await recipientAddress(invitation);
    let error: string | null = null;

    if (!to) {
      error = "Recipient has no email address";
    } else {
      try {
        const result = await notifier.sendInvitation({
          to,
          projectName: project.name,
          inviterName,
          inviteUrl: inviteUrlFor(deps.appUrl, invitation.token),
        });
        if (!result.success) error = result.error;
      } catch (err) {
        error = err instanceof Error ? err.message : "Unknown error";
      }
    }

    let recorded: InvitationRecord | null = null;
    try {
      recorded = await store.recordDelivery(invitation.id, { at: clock(), error });
    } catch (err) {
      ctx.log.warn({ event: "invitation.delivery_not_recorded", invitationId: invitation.id, err }, "could not record delivery");
    }

    if (error) {
      ctx.log.warn({ event: "invitation.notify_failed", invitationId: invitation.id, error }, "invitation email not sent");
      return {
        invitation: recorded ?? invitation,
        warnings: [`Invitation saved but the email could not be sent: ${error}`],
      };
    }
    ctx.log.info({ event: "invitation.notified", invitationId: invitation.id }, "invitation email sent");
    return { invitation: recorded ?? invitation, warnings: [] };
  }

  /** Owner, admin, or whoever sent the invitation. */
  async function authorizeInvitationChange(ctx: RequestContext, projectId: string, invitationId: string) {
    const actor = requireActor(deps, ctx);
    const resolved = await access.resolve(ctx, projectId);
    const invitation = resolved ? await store.findInvitationById(invitationId) : null;
    if (!resolved || !invitation || invitation.projectId !== resolved.project.id) {
      throw new AccessError("NotFound", "Invitation not found");
    }
    const isInviter = invitation.inviterId === actor.id;
    if (!isInviter && !can(resolved.role, "manage_members")) {
      if (resolved.role === "none") throw new AccessError("NotFound", "Invitation not found");
      throw new AccessError("PermissionDenied", "Only the owner, an admin or the inviter can change this invitation");
    }
    return { actor, project: resolved.project, invitation };
  }

  async function create(ctx: RequestContext, projectId: string, input: CreateInvitationInput): Promise<DeliveredInvitation> {
    const actor = requireActor(deps, ctx);
    const { project } = await access.authorize(ctx, projectId, "manage_members");

    const hasInvitee = hasText(input.inviteeId);
    const hasEmail = hasText(input.email);
    if (hasInvitee === hasEmail) {
      throw new AccessError("InvalidRecipient", "Provide either an invitee or an email address, not both");
    }

    let recipient: InvitationRecipient;
    let target: DirectoryUser | null;
    if (hasText(input.inviteeId)) {
      target = await directory.findById(input.inviteeId);
      if (!target) throw new AccessError("NotFound", "User not found");
      recipient = { inviteeId: target.id };
    } else if (hasText(input.email)) {
      const email = normalizeEmail(input.email);
      target = await directory.findByEmail(email);
      recipient = { email };
    } else {
      throw new AccessError("InvalidRecipient", "Provide either an invitee or an email address");
    }

    if (target) {
      if (target.id === project.ownerId) {
        throw new AccessError("OwnerConflict", "The project owner cannot be invited as a collaborator");
      }
      if (await store.findCollaborator(project.id, target.id)) {
        throw new AccessError("AlreadyCollaborator", "User is already a collaborator on this project");
      }
    }

    // the partial unique index is the real guard; this only gives a clean error in the common case
    if (await store.findPendingInvitation(project.id, recipient)) {
      throw new AccessError("DuplicatePending", "A pending invitation already exists for this recipient");
    }

    const now = clock();
    const expiresAt = input.expiresAt ?? expiryFrom(now);
    if (expiresAt.getTime() <= now.getTime()) {
      throw new AccessError("InvalidInput", "expiresAt must be in the future");
    }

    const invitation = await store.insertInvitation({
      ...recipient,
      projectId: project.id,
      inviterId: actor.id,
      token: newInvitationToken(),
      createdAt: now,
      expiresAt,
    });
    ctx.log.info(
      { event: "invitation.created", invitationId: invitation.id, projectId: project.id, inviterId: actor.id },
      "invitation created"
    );

    // email invitations reach registered users live too
    if (target) events.invitationReceived(target.id, invitation);
    return deliver(ctx, invitation, project, actor.name || actor.email);
  }

  async function accept(ctx: RequestContext, token: string): Promise<AcceptedInvitation> {
    const actor = requireActor(deps, ctx);
    const invitation = await store.findInvitationByToken(token);
    if (!invitation) throw new AccessError("NotFound", "Invitation not found");
    assertPending(invitation);

    const now = clock();
    if (now.getTime() > invitation.expiresAt.getTime()) {
      const expired = await store.transitionInvitation(invitation.id, "expired");
      if (!expired) throw new AccessError("InvalidState", "Invitation is no longer pending");
      ctx.log.info({ event: "invitation.expired", invitationId: invitation.id }, "invitation expired on accept");
      throw new AccessError("Expired", "Invitation has expired");
    }

    if (invitation.inviteeId && invitation.inviteeId !== actor.id) {
      throw new AccessError("PermissionDenied", "This invitation was sent to another user");
    }

    const project = await store.findProject(invitation.projectId);
    if (!project) throw new AccessError("NotFound", "Project not found");
    if (project.ownerId === actor.id) {
      throw new AccessError("OwnerConflict", "The project owner cannot join as a collaborator");
    }

    const accepted = await store.acceptInvitation(invitation.id, {
      userId: actor.id,
      email: actor.email,
      at: now,
      role: "viewer",
      addedBy: invitation.inviterId,
    });
    if (!accepted) throw new AccessError("InvalidState", "Invitation is no longer pending");

    ctx.log.info(
      { event: "invitation.accepted", invitationId: invitation.id, projectId: project.id, userId: actor.id },
      "invitation accepted"
    );
    events.collaboratorAdded(project.id, accepted.collaborator);
    return { ...accepted, project };
  }

  async function decline(ctx: RequestContext, token: string): Promise<InvitationRecord> {
    const actor = requireActor(deps, ctx);
    const invitation = await store.findInvitationByToken(token);
    if (!invitation) throw new AccessError("NotFound", "Invitation not found");
    assertPending(invitation);
    if (invitation.inviteeId && invitation.inviteeId !== actor.id) {
      throw new AccessError("PermissionDenied", "This invitation was sent to another user");
    }

    const declined = await store.transitionInvitation(invitation.id, "declined");
    if (!declined) throw new AccessError("InvalidState", "Invitation is no longer pending");
    ctx.log.info({ event: "invitation.declined", invitationId: invitation.id, userId: actor.id }, "invitation declined");
    return declined;
  }

  async function cancel(ctx: RequestContext, projectId: string, invitationId: string): Promise<InvitationRecord> {
    const { actor, invitation } = await authorizeInvitationChange(ctx, projectId, invitationId);
    assertPending(invitation);

    const cancelled = await store.transitionInvitation(invitation.id, "cancelled");
    if (!cancelled) throw new AccessError("InvalidState", "Invitation is no longer pending");
    ctx.log.info({ event: "invitation.cancelled", invitationId, projectId, userId: actor.id }, "invitation cancelled");
    return cancelled;
  }

  async function resend(ctx: RequestContext, projectId: string, invitationId: string): Promise<DeliveredInvitation> {
    const { actor, project, invitation } = await authorizeInvitationChange(ctx, projectId, invitationId);
    assertPending(invitation);

    const now = clock();
    if (now.getTime() > invitation.expiresAt.getTime()) {
      throw new AccessError("Expired", "Invitation has expired");
    }

    const extended = await store.extendInvitation(invitation.id, expiryFrom(now));
    if (!extended) throw new AccessError("InvalidState", "Invitation is no longer pending");
    ctx.log.info({ event: "invitation.resent", invitationId, projectId, userId: actor.id }, "invitation resent");

    const inviter = invitation.inviterId === actor.id ? null : await directory.findById(invitation.inviterId);
    const inviterName = inviter ? inviter.name : actor.name || actor.email;
    return deliver(ctx, extended, project, inviterName);
  }

  async function list(ctx: RequestContext, projectId: string): Promise<InvitationListing> {
    const { project } = await access.authorize(ctx, projectId, "view_members");
    const invitations = await store.listInvitations(project.id);
    return {
      invitations,
      pendingCount: invitations.filter((i) => i.status === "pending").length,
      acceptedCount: invitations.filter((i) => i.status === "accepted").length,
    };
  }

  /** Pending invitations addressed to the caller by id or by email. */
  async function listMine(ctx: RequestContext): Promise<InvitationRecord[]> {
    const actor = requireActor(deps, ctx);
    return store.listPendingInvitationsFor({ userId: actor.id, email: actor.email });
  }

  return { create, accept, decline, cancel, resend, list, listMine };
}

export type InvitationService = ReturnType<typeof createInvitationService>;
