import mongoose, { Schema, Document, Model } from "mongoose";
import { INVITATION_STATUSES, InvitationStatus } from "../access/invitationStatus";

export interface IInvitation extends Document {
  projectId: mongoose.Types.ObjectId;
  inviterId: mongoose.Types.ObjectId;
  inviteeId: mongoose.Types.ObjectId | null;
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

const invitationSchema = new Schema<IInvitation>(
  {
    projectId: { type: Schema.Types.ObjectId, ref: "Project", required: true, index: true },
    inviterId: { type: Schema.Types.ObjectId, ref: "User", required: true },
    inviteeId: { type: Schema.Types.ObjectId, ref: "User", default: null, index: true },
    email: { type: String, default: null, lowercase: true, trim: true, index: true },
    token: { type: String, required: true, unique: true, immutable: true },
    status: { type: String, enum: [...INVITATION_STATUSES], default: "pending" },
    acceptedAt: { type: Date, default: null },
    expiresAt: { type: Date, required: true },
    lastSentAt: { type: Date, default: null },
    sendCount: { type: Number, default: 0 },
    lastError: { type: String, default: null },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

// one pending invitation per recipient per project; terminal rows don't count
invitationSchema.index(
  { projectId: 1, inviteeId: 1 },
  { unique: true, partialFilterExpression: { status: "pending", inviteeId: { $type: "objectId" } } }
);
invitationSchema.index(
  { projectId: 1, email: 1 },
  { unique: true, partialFilterExpression: { status: "pending", email: { $type: "string" } } }
);
invitationSchema.index({ projectId: 1, createdAt: -1 });

export const Invitation: Model<IInvitation> = mongoose.model<IInvitation>("Invitation", invitationSchema);
