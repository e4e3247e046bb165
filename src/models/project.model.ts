import mongoose, { Schema, Document, Model } from 'mongoose';

export interface IProject extends Document {
  name: string;
  ownerId: mongoose.Types.ObjectId;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const ProjectSchema = new Schema<IProject>(
  {
    name: { type: String, required: true, trim: true },
    // set once on create; never part of an update
    ownerId: { type: Schema.Types.ObjectId, ref: 'User', required: true, index: true, immutable: true },
    active: { type: Boolean, default: true },
  },
  { timestamps: true }
);

export const Project: Model<IProject> = mongoose.model<IProject>('Project', ProjectSchema);
