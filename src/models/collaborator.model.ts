/* src/models/collaborator.model.ts */
import mongoose, { Schema, Document, Model } from "mongoose";
import { COLLABORATOR_ROLES, CollaboratorRole } from "../access/roles";

export interface ICollaborator extends Document {
  projectId: mongoose.Types.ObjectId;
  userId: mongoose.Types.ObjectId;
  role: CollaboratorRole;
  addedAt: Date;
  addedBy: mongoose.Types.ObjectId | null;
}

const collaboratorSchema = new Schema<ICollaborator>({
  projectId: { type: Schema.Types.ObjectId, ref: "Project", index: true, required: true },
  userId: { type: Schema.Types.ObjectId, ref: "User", index: true, required: true },
  role: { type: String, enum: [...COLLABORATOR_ROLES], required: true, default: "viewer" },
  addedAt: { type: Date, required: true, default: () => new Date() },
  // null = added by the system
  addedBy: { type: Schema.Types.ObjectId, ref: "User", default: null },
});

collaboratorSchema.index({ projectId: 1, userId: 1 }, { unique: true });
collaboratorSchema.index({ projectId: 1, addedAt: -1 });

export const Collaborator: Model<ICollaborator> = mongoose.model<ICollaborator>("Collaborator", collaboratorSchema);
