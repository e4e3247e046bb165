import env from "../config/env";
import { MongoCollabStore } from "../store/mongo";
import { MongoUserDirectory } from "../directory/users";
import { ResendNotifier } from "../mailer/resend";
import { noopEvents } from "../realtime/events";
import { createAccessService } from "./access";
import { createProjectService } from "./projects";
import { createInvitationService } from "./invitations";
import { createCollaboratorService } from "./collaborators";
import type { ServiceDeps } from "./context";

/** Production wiring: Mongo store and directory, Resend mail. */
export function createDefaultDeps(overrides: Partial<ServiceDeps> = {}): ServiceDeps {
  return {
    store: new MongoCollabStore(),
    directory: new MongoUserDirectory(),
    notifier: new ResendNotifier(),
    events: noopEvents,
    clock: () => new Date(),
    appUrl: env.APP_URL,
    inviteTtlDays: env.INVITE_EXPIRES_DAYS,
    exposeTokens: env.INVITE_TOKEN_IN_RESPONSE,
    ...overrides,
  };
}

export function createServices(deps: ServiceDeps) {
  return {
    access: createAccessService(deps),
    projects: createProjectService(deps),
    invitations: createInvitationService(deps),
    collaborators: createCollaboratorService(deps),
    exposeTokens: deps.exposeTokens,
  };
}

export type Services = ReturnType<typeof createServices>;
