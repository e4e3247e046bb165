import mongoose, { Schema, Document, Model } from 'mongoose';

/**
 * Directory record for a person. Credentials are owned by the identity
 * provider that issues access tokens; this collection only mirrors the
 * profile fields membership needs.
 */
export interface IUser extends Document {
  email: string;
  name: string;
  verified: boolean;
  avatarUrl?: string;
  createdAt: Date;
  updatedAt: Date;
}

const UserSchema = new Schema<IUser>(
  {
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    name: { type: String, required: true },
    verified: { type: Boolean, default: false },
    avatarUrl: { type: String },
  },
  { timestamps: true }
);

export const User: Model<IUser> = mongoose.model<IUser>('User', UserSchema);
