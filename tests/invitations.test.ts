import { describe, it, expect, beforeEach } from "vitest";
import type { AccessErrorKind } from "../src/utils/errors";
import type { ProjectRecord } from "../src/store/types";
import { ctxFor, DAY_MS, setup, START } from "./support/fixtures";

type Env = ReturnType<typeof setup>;

function rejectsWith(promise: Promise<unknown>, kind: AccessErrorKind) {
  return expect(promise).rejects.toMatchObject({ name: "AccessError", kind });
}

describe("invitations", () => {
  let env: Env;
  let project: ProjectRecord;

  beforeEach(async () => {
    env = setup();
    project = await env.services.projects.create(ctxFor(env.users.alice), "P1");
  });

  async function grant(userId: string, role: "viewer" | "contributor" | "admin") {
    return env.services.collaborators.add(ctxFor(env.users.alice), project.id, userId, role);
  }

  function invite(input: { inviteeId?: string; email?: string; expiresAt?: Date }, by = env.users.alice) {
    return env.services.invitations.create(ctxFor(by), project.id, input);
  }

  describe("create", () => {
    it("stores a pending email invitation expiring in 30 days and mails the link", async () => {
      const { invitation, warnings } = await invite({ email: "  Newbie@X.com " });

      expect(warnings).toEqual([]);
      expect(invitation.status).toBe("pending");
      expect(invitation.email).toBe("newbie@x.com");
      expect(invitation.inviteeId).toBeNull();
      expect(invitation.inviterId).toBe("u-alice");
      expect(invitation.acceptedAt).toBeNull();
      expect(invitation.createdAt.getTime()).toBe(START.getTime());
      expect(invitation.expiresAt.getTime()).toBe(START.getTime() + 30 * DAY_MS);
      expect(invitation.token).toMatch(/^[0-9a-f]{64}$/);
      expect(invitation.sendCount).toBe(1);
      expect(invitation.lastSentAt?.getTime()).toBe(START.getTime());
      expect(invitation.lastError).toBeNull();

      expect(env.notifier.sent).toEqual([
        {
          to: "newbie@x.com",
          projectName: "P1",
          inviterName: "Alice",
          inviteUrl: `https://app.test/invitations/${invitation.token}`,
        },
      ]);
    });

    it("keeps an explicit expiry", async () => {
      const expiresAt = new Date(START.getTime() + 2 * DAY_MS);
      const { invitation } = await invite({ email: "newbie@x.com", expiresAt });
      expect(invitation.expiresAt.getTime()).toBe(expiresAt.getTime());
    });

    it("rejects an expiry that is not in the future", async () => {
      await rejectsWith(invite({ email: "newbie@x.com", expiresAt: START }), "InvalidInput");
      expect(env.store.invitations.size).toBe(0);
    });

    it("gives each invitation its own token", async () => {
      const first = await invite({ email: "one@x.com" });
      const second = await invite({ email: "two@x.com" });
      expect(first.invitation.token).not.toBe(second.invitation.token);
    });

    it("requires exactly one recipient", async () => {
      await rejectsWith(invite({}), "InvalidRecipient");
      await rejectsWith(invite({ email: "   " }), "InvalidRecipient");
      await rejectsWith(invite({ inviteeId: "u-bob", email: "bob@x.com" }), "InvalidRecipient");
      expect(env.store.invitations.size).toBe(0);
    });

    it("rejects an unknown invitee", async () => {
      await rejectsWith(invite({ inviteeId: "u-nobody" }), "NotFound");
    });

    it("refuses to invite the owner in either form", async () => {
      await rejectsWith(invite({ inviteeId: "u-alice" }), "OwnerConflict");
      await rejectsWith(invite({ email: "ALICE@x.com" }), "OwnerConflict");
    });

    it("refuses existing collaborators by id or by their email", async () => {
      await grant("u-bob", "viewer");
      await rejectsWith(invite({ inviteeId: "u-bob" }), "AlreadyCollaborator");
      await rejectsWith(invite({ email: "bob@x.com" }), "AlreadyCollaborator");
      expect(env.store.invitations.size).toBe(0);
    });

    it("allows one pending invitation per recipient", async () => {
      await invite({ email: "newbie@x.com" });
      await rejectsWith(invite({ email: "NEWBIE@x.com" }), "DuplicatePending");

      await invite({ inviteeId: "u-bob" });
      await rejectsWith(invite({ inviteeId: "u-bob" }), "DuplicatePending");
    });

    it("lets the recipient be invited again once the earlier invitation is finished", async () => {
      const first = await invite({ email: "newbie@x.com" });
      await env.services.invitations.cancel(ctxFor(env.users.alice), project.id, first.invitation.id);

      const second = await invite({ email: "newbie@x.com" });
      expect(second.invitation.status).toBe("pending");
      expect(second.invitation.id).not.toBe(first.invitation.id);
    });

    it("enforces the pending uniqueness in the store as well", async () => {
      await invite({ email: "newbie@x.com" });
      await rejectsWith(
        env.store.insertInvitation({
          projectId: project.id,
          inviterId: "u-alice",
          email: "newbie@x.com",
          token: "second-token",
          createdAt: START,
          expiresAt: new Date(START.getTime() + DAY_MS),
        }),
        "DuplicatePending"
      );
    });

    it("lets an admin invite but not a contributor; strangers do not see the project", async () => {
      await grant("u-carol", "admin");
      await grant("u-dave", "contributor");

      const { invitation } = await invite({ email: "newbie@x.com" }, env.users.carol);
      expect(invitation.inviterId).toBe("u-carol");

      await rejectsWith(invite({ email: "other@x.com" }, env.users.dave), "PermissionDenied");
      await rejectsWith(invite({ email: "other@x.com" }, env.users.bob), "NotFound");
    });

    it("requires an authenticated caller", async () => {
      await rejectsWith(env.services.invitations.create(ctxFor(null), project.id, { email: "x@x.com" }), "PermissionDenied");
    });

    it("keeps the invitation and reports a warning when mail fails", async () => {
      env.notifier.failWith = "smtp down";
      const { invitation, warnings } = await invite({ email: "newbie@x.com" });

      expect(warnings).toEqual(["Invitation saved but the email could not be sent: smtp down"]);
      const stored = await env.store.findInvitationById(invitation.id);
      expect(stored?.status).toBe("pending");
      expect(stored?.lastError).toBe("smtp down");
      expect(stored?.sendCount).toBe(1);
    });

    it("reports a warning when the notifier throws", async () => {
      env.notifier.sendInvitation = async () => {
        throw new Error("connection reset");
      };
      const { invitation, warnings } = await invite({ email: "newbie@x.com" });
      expect(warnings).toEqual(["Invitation saved but the email could not be sent: connection reset"]);
      expect(invitation.status).toBe("pending");
    });

    it("mails a known invitee at their directory address and notifies them live", async () => {
      const { invitation } = await invite({ inviteeId: "u-bob" });

      expect(invitation.inviteeId).toBe("u-bob");
      expect(invitation.email).toBeNull();
      expect(env.notifier.sent[0]?.to).toBe("bob@x.com");
      expect(env.events).toEqual([{ type: "invitationReceived", target: "u-bob", id: invitation.id }]);
    });

    it("notifies a registered user invited by email address", async () => {
      const { invitation } = await invite({ email: "BOB@x.com" });
      expect(invitation.inviteeId).toBeNull();
      expect(env.events).toEqual([{ type: "invitationReceived", target: "u-bob", id: invitation.id }]);
    });

    it("sends no live notice for an address nobody has registered", async () => {
      await invite({ email: "newbie@x.com" });
      expect(env.events).toEqual([]);
    });
  });

  describe("accept", () => {
    it("turns an email invitation into a viewer collaborator bound to the new user", async () => {
      const { invitation } = await invite({ email: "erin@x.com" });
      const erin = env.directory.register("u-erin", "erin@x.com", "Erin");
      env.advance(60_000);

      const result = await env.services.invitations.accept(ctxFor(erin), invitation.token);

      expect(result.invitation.status).toBe("accepted");
      expect(result.invitation.inviteeId).toBe("u-erin");
      expect(result.invitation.acceptedAt?.getTime()).toBe(START.getTime() + 60_000);
      expect(result.collaborator).toMatchObject({
        projectId: project.id,
        userId: "u-erin",
        role: "viewer",
        addedBy: "u-alice",
      });
      expect(result.project.id).toBe(project.id);

      const row = await env.store.findCollaborator(project.id, "u-erin");
      expect(row?.role).toBe("viewer");
      expect(env.events.at(-1)).toEqual({ type: "collaboratorAdded", target: project.id, id: result.collaborator.id });
    });

    it("uses viewer even when an admin sent the invitation", async () => {
      await grant("u-carol", "admin");
      const { invitation } = await invite({ inviteeId: "u-bob" }, env.users.carol);

      const { collaborator } = await env.services.invitations.accept(ctxFor(env.users.bob), invitation.token);
      expect(collaborator.role).toBe("viewer");
      expect(collaborator.addedBy).toBe("u-carol");
    });

    it("fails for an unknown token", async () => {
      await rejectsWith(env.services.invitations.accept(ctxFor(env.users.bob), "no-such-token"), "NotFound");
    });

    it("marks the invitation expired when accepted too late", async () => {
      const { invitation } = await invite({ inviteeId: "u-bob" });
      env.advance(30 * DAY_MS + 1);

      await rejectsWith(env.services.invitations.accept(ctxFor(env.users.bob), invitation.token), "Expired");

      const stored = await env.store.findInvitationById(invitation.id);
      expect(stored?.status).toBe("expired");
      expect(stored?.acceptedAt).toBeNull();
      expect(await env.store.findCollaborator(project.id, "u-bob")).toBeNull();

      await rejectsWith(env.services.invitations.accept(ctxFor(env.users.bob), invitation.token), "InvalidState");
    });

    it("still accepts at the exact expiry instant", async () => {
      const { invitation } = await invite({ inviteeId: "u-bob" });
      env.advance(30 * DAY_MS);

      const { invitation: accepted } = await env.services.invitations.accept(ctxFor(env.users.bob), invitation.token);
      expect(accepted.status).toBe("accepted");
    });

    it("only lets the named invitee accept", async () => {
      const { invitation } = await invite({ inviteeId: "u-bob" });
      await rejectsWith(env.services.invitations.accept(ctxFor(env.users.carol), invitation.token), "PermissionDenied");
      expect((await env.store.findInvitationById(invitation.id))?.status).toBe("pending");
    });

    it("does not let the owner join as a collaborator", async () => {
      const { invitation } = await invite({ email: "shared-inbox@x.com" });
      await rejectsWith(env.services.invitations.accept(ctxFor(env.users.alice), invitation.token), "OwnerConflict");
      expect((await env.store.findInvitationById(invitation.id))?.status).toBe("pending");
    });

    it("never transitions twice", async () => {
      const { invitation } = await invite({ inviteeId: "u-bob" });
      await env.services.invitations.accept(ctxFor(env.users.bob), invitation.token);

      await rejectsWith(env.services.invitations.accept(ctxFor(env.users.bob), invitation.token), "InvalidState");
      await rejectsWith(env.services.invitations.decline(ctxFor(env.users.bob), invitation.token), "InvalidState");
      expect((await env.store.findInvitationById(invitation.id))?.status).toBe("accepted");
    });

    it("creates exactly one collaborator when the same token is accepted concurrently", async () => {
      const { invitation } = await invite({ inviteeId: "u-bob" });

      const results = await Promise.allSettled([
        env.services.invitations.accept(ctxFor(env.users.bob), invitation.token),
        env.services.invitations.accept(ctxFor(env.users.bob), invitation.token),
      ]);

      const fulfilled = results.filter((r) => r.status === "fulfilled");
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(["InvalidState", "DuplicateCollaborator"]).toContain(rejected[0]?.reason.kind);

      const rows = await env.store.listCollaborators(project.id);
      expect(rows.filter((r) => r.userId === "u-bob")).toHaveLength(1);
      expect((await env.store.findInvitationById(invitation.id))?.status).toBe("accepted");
    });

    it("cancels the user's other pending invitations to the project on acceptance", async () => {
      const byEmail = await invite({ email: "bob@x.com" });
      const byId = await invite({ inviteeId: "u-bob" });
      const forCarol = await invite({ inviteeId: "u-carol" });

      await env.services.invitations.accept(ctxFor(env.users.bob), byEmail.invitation.token);

      expect((await env.store.findInvitationById(byId.invitation.id))?.status).toBe("cancelled");
      expect((await env.store.findInvitationById(forCarol.invitation.id))?.status).toBe("pending");
      expect(await env.services.invitations.listMine(ctxFor(env.users.bob))).toEqual([]);
      await rejectsWith(
        env.services.invitations.accept(ctxFor(env.users.bob), byId.invitation.token),
        "InvalidState"
      );
    });

    it("leaves the invitation pending when the user was granted access directly in the meantime", async () => {
      const { invitation } = await invite({ inviteeId: "u-bob" });
      await grant("u-bob", "contributor");

      await rejectsWith(
        env.services.invitations.accept(ctxFor(env.users.bob), invitation.token),
        "DuplicateCollaborator"
      );

      const stored = await env.store.findInvitationById(invitation.id);
      expect(stored?.status).toBe("pending");
      expect(stored?.acceptedAt).toBeNull();
      const rows = await env.store.listCollaborators(project.id);
      expect(rows.map((r) => r.role)).toEqual(["contributor"]);
    });
  });

  describe("decline", () => {
    it("marks the invitation declined without adding anyone", async () => {
      const { invitation } = await invite({ email: "bob@x.com" });
      const declined = await env.services.invitations.decline(ctxFor(env.users.bob), invitation.token);

      expect(declined.status).toBe("declined");
      expect(declined.acceptedAt).toBeNull();
      expect(await env.store.listCollaborators(project.id)).toEqual([]);
      await rejectsWith(env.services.invitations.accept(ctxFor(env.users.bob), invitation.token), "InvalidState");
    });

    it("is refused for someone else's invitation", async () => {
      const { invitation } = await invite({ inviteeId: "u-bob" });
      await rejectsWith(env.services.invitations.decline(ctxFor(env.users.dave), invitation.token), "PermissionDenied");
    });

    it("fails for an unknown token", async () => {
      await rejectsWith(env.services.invitations.decline(ctxFor(env.users.bob), "missing"), "NotFound");
    });
  });

  describe("cancel", () => {
    it("sets cancelled, distinct from expired", async () => {
      const { invitation } = await invite({ email: "newbie@x.com" });
      const cancelled = await env.services.invitations.cancel(ctxFor(env.users.alice), project.id, invitation.id);
      expect(cancelled.status).toBe("cancelled");
      await rejectsWith(
        env.services.invitations.cancel(ctxFor(env.users.alice), project.id, invitation.id),
        "InvalidState"
      );
    });

    it("fails on an accepted invitation and leaves the collaborator alone", async () => {
      const { invitation } = await invite({ inviteeId: "u-bob" });
      const { collaborator } = await env.services.invitations.accept(ctxFor(env.users.bob), invitation.token);

      await rejectsWith(
        env.services.invitations.cancel(ctxFor(env.users.alice), project.id, invitation.id),
        "InvalidState"
      );
      expect(await env.store.findCollaboratorById(collaborator.id)).toEqual(collaborator);
      expect((await env.store.findInvitationById(invitation.id))?.status).toBe("accepted");
    });

    it("lets the original inviter cancel after losing admin rights", async () => {
      const carolRow = await grant("u-carol", "admin");
      const { invitation } = await invite({ email: "newbie@x.com" }, env.users.carol);
      await env.services.collaborators.updateRole(ctxFor(env.users.alice), project.id, carolRow.id, "viewer");

      const cancelled = await env.services.invitations.cancel(ctxFor(env.users.carol), project.id, invitation.id);
      expect(cancelled.status).toBe("cancelled");
    });

    it("refuses collaborators who neither manage members nor sent it", async () => {
      await grant("u-dave", "contributor");
      const { invitation } = await invite({ email: "newbie@x.com" });

      await rejectsWith(
        env.services.invitations.cancel(ctxFor(env.users.dave), project.id, invitation.id),
        "PermissionDenied"
      );
      await rejectsWith(
        env.services.invitations.cancel(ctxFor(env.users.bob), project.id, invitation.id),
        "NotFound"
      );
    });

    it("does not find an invitation through another project", async () => {
      const other = await env.services.projects.create(ctxFor(env.users.alice), "P2");
      const { invitation } = await invite({ email: "newbie@x.com" });
      await rejectsWith(
        env.services.invitations.cancel(ctxFor(env.users.alice), other.id, invitation.id),
        "NotFound"
      );
    });
  });

  describe("resend", () => {
    it("pushes the expiry out 30 days from now and mails again", async () => {
      const { invitation } = await invite({ email: "newbie@x.com" });
      env.advance(10 * DAY_MS);

      const { invitation: resent, warnings } = await env.services.invitations.resend(
        ctxFor(env.users.alice),
        project.id,
        invitation.id
      );

      expect(warnings).toEqual([]);
      expect(resent.expiresAt.getTime()).toBe(START.getTime() + 40 * DAY_MS);
      expect(resent.sendCount).toBe(2);
      expect(resent.lastSentAt?.getTime()).toBe(START.getTime() + 10 * DAY_MS);
      expect(resent.token).toBe(invitation.token);
      expect(env.notifier.sent).toHaveLength(2);
    });

    it("names the original inviter in the mail", async () => {
      await grant("u-carol", "admin");
      const { invitation } = await invite({ email: "newbie@x.com" }, env.users.carol);

      await env.services.invitations.resend(ctxFor(env.users.alice), project.id, invitation.id);
      expect(env.notifier.sent[1]?.inviterName).toBe("Carol");
    });

    it("fails once the invitation has run out, without changing its status", async () => {
      const { invitation } = await invite({ email: "newbie@x.com" });
      env.advance(31 * DAY_MS);

      await rejectsWith(
        env.services.invitations.resend(ctxFor(env.users.alice), project.id, invitation.id),
        "Expired"
      );
      expect((await env.store.findInvitationById(invitation.id))?.status).toBe("pending");
    });

    it("fails for finished invitations", async () => {
      const { invitation } = await invite({ email: "newbie@x.com" });
      await env.services.invitations.cancel(ctxFor(env.users.alice), project.id, invitation.id);
      await rejectsWith(
        env.services.invitations.resend(ctxFor(env.users.alice), project.id, invitation.id),
        "InvalidState"
      );
    });

    it("is limited to owner, admins and the inviter", async () => {
      await grant("u-dave", "viewer");
      const { invitation } = await invite({ email: "newbie@x.com" });
      await rejectsWith(
        env.services.invitations.resend(ctxFor(env.users.dave), project.id, invitation.id),
        "PermissionDenied"
      );
    });

    it("returns a warning when mail fails again", async () => {
      const { invitation } = await invite({ email: "newbie@x.com" });
      env.notifier.failWith = "quota exceeded";

      const { invitation: resent, warnings } = await env.services.invitations.resend(
        ctxFor(env.users.alice),
        project.id,
        invitation.id
      );
      expect(warnings).toEqual(["Invitation saved but the email could not be sent: quota exceeded"]);
      expect(resent.lastError).toBe("quota exceeded");
      expect(resent.sendCount).toBe(2);
    });
  });

  describe("listing", () => {
    it("shows project invitations newest first with counts to any collaborator", async () => {
      await grant("u-dave", "viewer");
      const first = await invite({ email: "one@x.com" });
      env.advance(1000);
      const second = await invite({ inviteeId: "u-bob" });
      await env.services.invitations.accept(ctxFor(env.users.bob), second.invitation.token);

      const listing = await env.services.invitations.list(ctxFor(env.users.dave), project.id);
      expect(listing.invitations.map((i) => i.id)).toEqual([second.invitation.id, first.invitation.id]);
      expect(listing.pendingCount).toBe(1);
      expect(listing.acceptedCount).toBe(1);
    });

    it("hides a project's invitations from outsiders", async () => {
      await rejectsWith(env.services.invitations.list(ctxFor(env.users.bob), project.id), "NotFound");
    });

    it("lists the caller's pending invitations by id and by email", async () => {
      const other = await env.services.projects.create(ctxFor(env.users.carol), "P2");
      const byEmail = await invite({ email: "BOB@x.com" });
      const byId = await env.services.invitations.create(ctxFor(env.users.carol), other.id, { inviteeId: "u-bob" });
      await invite({ email: "someone-else@x.com" });

      const mine = await env.services.invitations.listMine(ctxFor(env.users.bob));
      expect(mine.map((i) => i.id).sort()).toEqual([byEmail.invitation.id, byId.invitation.id].sort());

      await env.services.invitations.decline(ctxFor(env.users.bob), byId.invitation.token);
      const after = await env.services.invitations.listMine(ctxFor(env.users.bob));
      expect(after.map((i) => i.id)).toEqual([byEmail.invitation.id]);
    });
  });
});
