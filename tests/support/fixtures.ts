import pino from "pino";
import { MemoryCollabStore } from "./memoryStore";
import { createServices } from "../../src/services";
import type { ServiceDeps, RequestContext } from "../../src/services/context";
import type { AuthUser, DirectoryUser, UserDirectory } from "../../src/directory/users";
import { normalizeEmail } from "../../src/directory/users";
import type { InvitationMessage, Notifier, NotifyResult } from "../../src/mailer/notifier";
import type { MembershipEvents } from "../../src/realtime/events";

export const silentLog = pino({ level: "silent" });

export class MemoryUserDirectory implements UserDirectory {
  private readonly users = new Map<string, DirectoryUser>();

  register(id: string, email: string, name: string): AuthUser {
    this.users.set(id, { id, email: normalizeEmail(email), name, avatarUrl: null });
    return { id, email: normalizeEmail(email), name };
  }

  isAuthenticated(user: AuthUser | null | undefined): user is AuthUser {
    return !!user && user.id.length > 0;
  }

  async findById(id: string) {
    return this.users.get(id) ?? null;
  }

  async findByEmail(email: string) {
    const wanted = normalizeEmail(email);
    for (const u of this.users.values()) if (u.email === wanted) return u;
    return null;
  }
}

export class FakeNotifier implements Notifier {
  readonly sent: InvitationMessage[] = [];
  failWith: string | null = null;

  async sendInvitation(message: InvitationMessage): Promise<NotifyResult> {
    if (this.failWith) return { success: false, error: this.failWith };
    this.sent.push(message);
    return { success: true };
  }
}

export type RecordedEvent = { type: keyof MembershipEvents; target: string; id: string };

export function recordingEvents() {
  const log: RecordedEvent[] = [];
  const events: MembershipEvents = {
    invitationReceived: (userId, invitation) => log.push({ type: "invitationReceived", target: userId, id: invitation.id }),
    collaboratorAdded: (projectId, c) => log.push({ type: "collaboratorAdded", target: projectId, id: c.id }),
    collaboratorUpdated: (projectId, c) => log.push({ type: "collaboratorUpdated", target: projectId, id: c.id }),
    collaboratorRemoved: (projectId, c) => log.push({ type: "collaboratorRemoved", target: projectId, id: c.id }),
    projectDeleted: (projectId) => log.push({ type: "projectDeleted", target: projectId, id: projectId }),
  };
  return { events, log };
}

export const START = new Date("2026-03-01T09:00:00.000Z");
export const DAY_MS = 24 * 60 * 60 * 1000;

export function setup(overrides: Partial<ServiceDeps> = {}) {
  const store = new MemoryCollabStore();
  const directory = new MemoryUserDirectory();
  const notifier = new FakeNotifier();
  const recorded = recordingEvents();
  let now = START.getTime();

  const deps: ServiceDeps = {
    store,
    directory,
    notifier,
    events: recorded.events,
    clock: () => new Date(now),
    appUrl: "https://app.test",
    inviteTtlDays: 30,
    exposeTokens: false,
    ...overrides,
  };

  const alice = directory.register("u-alice", "alice@x.com", "Alice");
  const bob = directory.register("u-bob", "bob@x.com", "Bob");
  const carol = directory.register("u-carol", "carol@x.com", "Carol");
  const dave = directory.register("u-dave", "dave@x.com", "Dave");

  return {
    store,
    directory,
    notifier,
    events: recorded.log,
    deps,
    services: createServices(deps),
    users: { alice, bob, carol, dave },
    advance(ms: number) {
      now += ms;
    },
    now: () => new Date(now),
  };
}

export function ctxFor(user: AuthUser | null): RequestContext {
  return { actor: user, log: silentLog };
}
