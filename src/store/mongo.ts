import mongoose from "mongoose";
import type { ClientSession } from "mongoose";
import { Project } from "../models/project.model";
import { Collaborator } from "../models/collaborator.model";
import { Invitation } from "../models/invitation.model";
import { CollaboratorRole } from "../access/roles";
import { InvitationStatus } from "../access/invitationStatus";
import { AccessError, isDuplicateKeyError } from "../utils/errors";
import type {
  AcceptInvitationInput,
  CollabStore,
  CollaboratorRecord,
  InvitationRecipient,
  InvitationRecord,
  NewCollaborator,
  NewInvitation,
  NewProject,
  ProjectPatch,
  ProjectRecord,
} from "./types";

function isValidObjectId(id: string) {
  return mongoose.Types.ObjectId.isValid(id);
}

function idOrNull(value: unknown): string | null {
  return value == null ? null : String(value);
}

type ProjectDoc = { _id: unknown; name: string; ownerId: unknown; active: boolean; createdAt: Date; updatedAt: Date };

type CollaboratorDoc = {
  _id: unknown;
  projectId: unknown;
  userId: unknown;
  role: CollaboratorRole;
  addedAt: Date;
  addedBy?: unknown;
};

type InvitationDoc = {
  _id: unknown;
  projectId: unknown;
  inviterId: unknown;
  inviteeId?: unknown;
  email?: string | null;
  token: string;
  status: InvitationStatus;
  createdAt: Date;
  acceptedAt?: Date | null;
  expiresAt: Date;
  lastSentAt?: Date | null;
  sendCount?: number;
  lastError?: string | null;
};

function toProject(p: ProjectDoc): ProjectRecord {
  return {
    id: String(p._id),
    name: p.name,
    ownerId: String(p.ownerId),
    active: p.active,
    createdAt: p.createdAt,
    updatedAt: p.updatedAt,
  };
}

function toCollaborator(c: CollaboratorDoc): CollaboratorRecord {
  return {
    id: String(c._id),
    projectId: String(c.projectId),
    userId: String(c.userId),
    role: c.role,
    addedAt: c.addedAt,
    addedBy: idOrNull(c.addedBy),
  };
}

function toInvitation(i: InvitationDoc): InvitationRecord {
  return {
    id: String(i._id),
    projectId: String(i.projectId),
    inviterId: String(i.inviterId),
    inviteeId: idOrNull(i.inviteeId),
    email: i.email ?? null,
    token: i.token,
    status: i.status,
    createdAt: i.createdAt,
    acceptedAt: i.acceptedAt ?? null,
    expiresAt: i.expiresAt,
    lastSentAt: i.lastSentAt ?? null,
    sendCount: i.sendCount ?? 0,
    lastError: i.lastError ?? null,
  };
}

function recipientFilter(recipient: InvitationRecipient) {
  return recipient.inviteeId !== undefined
    ? { inviteeId: recipient.inviteeId }
    : { email: recipient.email.trim().toLowerCase() };
}

/**
 * Runs `work` as one transaction. Every write inside must pass the session on;
 * a rejection from `work` aborts everything it wrote.
 */
export type TransactionRunner = <T>(work: (session: ClientSession | undefined) => Promise<T>) => Promise<T>;

// needs a replica set; see config/db.ts
export const mongoTransaction: TransactionRunner = async (work) => {
  const session = await mongoose.startSession();
  try {
    return await session.withTransaction(() => work(session));
  } finally {
    await session.endSession();
  }
};

/** `CollabStore` over the Mongoose models; uniqueness comes from their indexes. */
export class MongoCollabStore implements CollabStore {
  constructor(private readonly transaction: TransactionRunner = mongoTransaction) {}

  async findProject(id: string) {
    if (!isValidObjectId(id)) return null;
    const p = await Project.findById(id).lean<ProjectDoc>();
    return p ? toProject(p) : null;
  }

  async findProjects(ids: string[]) {
    const valid = ids.filter(isValidObjectId);
    if (!valid.length) return [];
    const docs = await Project.find({ _id: { $in: valid } }).sort({ createdAt: -1 }).lean<ProjectDoc[]>();
    return docs.map(toProject);
  }

  async listOwnedProjects(ownerId: string) {
    if (!isValidObjectId(ownerId)) return [];
    const docs = await Project.find({ ownerId }).sort({ createdAt: -1 }).lean<ProjectDoc[]>();
    return docs.map(toProject);
  }

  async createProject(input: NewProject) {
    const created = await Project.create({ name: input.name, ownerId: input.ownerId, active: true });
    return toProject(created.toObject<ProjectDoc>());
  }

  async updateProject(id: string, patch: ProjectPatch) {
    if (!isValidObjectId(id)) return null;
    const update: ProjectPatch = {};
    if (patch.name !== undefined) update.name = patch.name;
    if (patch.active !== undefined) update.active = patch.active;
    const p = await Project.findOneAndUpdate({ _id: id }, { $set: update }, { new: true }).lean<ProjectDoc>();
    return p ? toProject(p) : null;
  }

  async deleteProject(id: string) {
    if (!isValidObjectId(id)) return false;
    return this.transaction(async (session) => {
      const deleted = await Project.deleteOne({ _id: id }, { session });
      if (deleted.deletedCount === 0) return false;
      await Collaborator.deleteMany({ projectId: id }, { session });
      await Invitation.deleteMany({ projectId: id }, { session });
      return true;
    });
  }

  async findCollaborator(projectId: string, userId: string) {
    if (!isValidObjectId(projectId) || !isValidObjectId(userId)) return null;
    const c = await Collaborator.findOne({ projectId, userId }).lean<CollaboratorDoc>();
    return c ? toCollaborator(c) : null;
  }

  async findCollaboratorById(id: string) {
    if (!isValidObjectId(id)) return null;
    const c = await Collaborator.findById(id).lean<CollaboratorDoc>();
    return c ? toCollaborator(c) : null;
  }

  async insertCollaborator(input: NewCollaborator) {
    try {
      const created = await Collaborator.create(input);
      return toCollaborator(created.toObject<CollaboratorDoc>());
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new AccessError("DuplicateCollaborator", "User is already a collaborator on this project");
      }
      throw err;
    }
  }

  async updateCollaboratorRole(id: string, role: CollaboratorRole) {
    if (!isValidObjectId(id)) return null;
    const c = await Collaborator.findOneAndUpdate({ _id: id }, { $set: { role } }, { new: true }).lean<CollaboratorDoc>();
    return c ? toCollaborator(c) : null;
  }

  async deleteCollaborator(id: string) {
    if (!isValidObjectId(id)) return false;
    const res = await Collaborator.deleteOne({ _id: id });
    return res.deletedCount > 0;
  }

  async listCollaborators(projectId: string) {
    if (!isValidObjectId(projectId)) return [];
    const docs = await Collaborator.find({ projectId }).sort({ addedAt: -1, _id: -1 }).lean<CollaboratorDoc[]>();
    return docs.map(toCollaborator);
  }

  async listCollaborationsOf(userId: string) {
    if (!isValidObjectId(userId)) return [];
    const docs = await Collaborator.find({ userId }).sort({ addedAt: -1 }).lean<CollaboratorDoc[]>();
    return docs.map(toCollaborator);
  }

  async findInvitationById(id: string) {
    if (!isValidObjectId(id)) return null;
    const i = await Invitation.findById(id).lean<InvitationDoc>();
    return i ? toInvitation(i) : null;
  }

  async findInvitationByToken(token: string) {
    const i = await Invitation.findOne({ token }).lean<InvitationDoc>();
    return i ? toInvitation(i) : null;
  }

  async findPendingInvitation(projectId: string, recipient: InvitationRecipient) {
    if (!isValidObjectId(projectId)) return null;
    if (recipient.inviteeId !== undefined && !isValidObjectId(recipient.inviteeId)) return null;
    const i = await Invitation.findOne({ projectId, status: "pending", ...recipientFilter(recipient) }).lean<InvitationDoc>();
    return i ? toInvitation(i) : null;
  }

  async insertInvitation(input: NewInvitation) {
    try {
      const created = await Invitation.create({
        projectId: input.projectId,
        inviterId: input.inviterId,
        inviteeId: input.inviteeId ?? null,
        email: input.email ?? null,
        token: input.token,
        status: "pending",
        createdAt: input.createdAt,
        expiresAt: input.expiresAt,
      });
      return toInvitation(created.toObject<InvitationDoc>());
    } catch (err) {
      // the token index is unique too, but a collision there is not a duplicate invitation
      if (isDuplicateKeyError(err) && err.keyPattern && ("inviteeId" in err.keyPattern || "email" in err.keyPattern)) {
        throw new AccessError("DuplicatePending", "A pending invitation already exists for this recipient");
      }
      throw err;
    }
  }

  async transitionInvitation(id: string, to: "declined" | "expired" | "cancelled") {
    if (!isValidObjectId(id)) return null;
    const i = await Invitation.findOneAndUpdate(
      { _id: id, status: "pending" },
      { $set: { status: to } },
      { new: true }
    ).lean<InvitationDoc>();
    return i ? toInvitation(i) : null;
  }

  async acceptInvitation(id: string, input: AcceptInvitationInput) {
    if (!isValidObjectId(id)) return null;
    try {
      return await this.transaction(async (session) => {
        const invitation = await Invitation.findOneAndUpdate(
          { _id: id, status: "pending" },
          { $set: { status: "accepted", acceptedAt: input.at, inviteeId: input.userId } },
          { new: true, session }
        ).lean<InvitationDoc>();
        if (!invitation) return null;

        const [collaborator] = await Collaborator.create(
          [
            {
              projectId: invitation.projectId,
              userId: input.userId,
              role: input.role,
              addedBy: input.addedBy,
              addedAt: input.at,
            },
          ],
          { session }
        );

        // other pending invitations for the same person on this project are now moot
        await Invitation.updateMany(
          {
            projectId: invitation.projectId,
            status: "pending",
            _id: { $ne: id },
            $or: [{ inviteeId: input.userId }, { email: input.email.trim().toLowerCase() }],
          },
          { $set: { status: "cancelled" } },
          { session }
        );

        return {
          invitation: toInvitation(invitation),
          collaborator: toCollaborator(collaborator.toObject<CollaboratorDoc>()),
        };
      });
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new AccessError("DuplicateCollaborator", "User is already a collaborator on this project");
      }
      throw err;
    }
  }

  async extendInvitation(id: string, expiresAt: Date) {
    if (!isValidObjectId(id)) return null;
    const i = await Invitation.findOneAndUpdate(
      { _id: id, status: "pending" },
      { $set: { expiresAt } },
      { new: true }
    ).lean<InvitationDoc>();
    return i ? toInvitation(i) : null;
  }

  async recordDelivery(id: string, outcome: { at: Date; error: string | null }) {
    if (!isValidObjectId(id)) return null;
    const i = await Invitation.findOneAndUpdate(
      { _id: id },
      { $set: { lastSentAt: outcome.at, lastError: outcome.error }, $inc: { sendCount: 1 } },
      { new: true }
    ).lean<InvitationDoc>();
    return i ? toInvitation(i) : null;
  }

  async listInvitations(projectId: string) {
    if (!isValidObjectId(projectId)) return [];
    const docs = await Invitation.find({ projectId }).sort({ createdAt: -1, _id: -1 }).lean<InvitationDoc[]>();
    return docs.map(toInvitation);
  }

  async listPendingInvitationsFor(recipient: { userId: string; email: string }) {
    const or: Array<{ email: string } | { inviteeId: string }> = [{ email: recipient.email.trim().toLowerCase() }];
    if (isValidObjectId(recipient.userId)) or.push({ inviteeId: recipient.userId });
    const docs = await Invitation.find({ status: "pending", $or: or }).sort({ createdAt: -1 }).lean<InvitationDoc[]>();
    return docs.map(toInvitation);
  }
}
