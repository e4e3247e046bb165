import type { Logger } from "pino";
import type { CollabStore } from "../store/types";
import type { AuthUser, UserDirectory } from "../directory/users";
import type { Notifier } from "../mailer/notifier";
import type { MembershipEvents } from "../realtime/events";
import { AccessError } from "../utils/errors";

export interface ServiceDeps {
  store: CollabStore;
  directory: UserDirectory;
  notifier: Notifier;
  events: MembershipEvents;
  clock: () => Date;
  appUrl: string;
  inviteTtlDays: number;
  /** Include invitation tokens in listings (development only). */
  exposeTokens: boolean;
}

/** Per-request state handed to every service call. */
export interface RequestContext {
  actor: AuthUser | null;
  log: Logger;
}

export function requireActor(deps: Pick<ServiceDeps, "directory">, ctx: RequestContext): AuthUser {
  if (!deps.directory.isAuthenticated(ctx.actor)) {
    throw new AccessError("PermissionDenied", "Authentication required");
  }
  return ctx.actor;
}
