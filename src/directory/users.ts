import mongoose from "mongoose";
import { User } from "../models/user.model";

/** Identity of the caller, as carried by a verified access token. */
export interface AuthUser {
  id: string;
  email: string;
  name: string;
}

export interface DirectoryUser {
  id: string;
  email: string;
  name: string;
  avatarUrl: string | null;
}

export interface UserDirectory {
  isAuthenticated(user: AuthUser | null | undefined): user is AuthUser;
  findById(id: string): Promise<DirectoryUser | null>;
  findByEmail(email: string): Promise<DirectoryUser | null>;
}

export function normalizeEmail(email: string) {
  return email.trim().toLowerCase();
}

type UserDoc = { _id: unknown; email: string; name: string; avatarUrl?: string | null };

function toDirectoryUser(u: UserDoc): DirectoryUser {
  return { id: String(u._id), email: u.email, name: u.name, avatarUrl: u.avatarUrl ?? null };
}

export class MongoUserDirectory implements UserDirectory {
  isAuthenticated(user: AuthUser | null | undefined): user is AuthUser {
    return !!user && typeof user.id === "string" && user.id.length > 0;
  }

  async findById(id: string) {
    if (!mongoose.Types.ObjectId.isValid(id)) return null;
    const u = await User.findById(id).select("email name avatarUrl").lean<UserDoc>();
    return u ? toDirectoryUser(u) : null;
  }

  async findByEmail(email: string) {
    const u = await User.findOne({ email: normalizeEmail(email) }).select("email name avatarUrl").lean<UserDoc>();
    return u ? toDirectoryUser(u) : null;
  }
}
