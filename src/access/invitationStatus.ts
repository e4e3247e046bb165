export const INVITATION_STATUSES = ["pending", "accepted", "declined", "expired", "cancelled"] as const;
export type InvitationStatus = (typeof INVITATION_STATUSES)[number];

/** Every status other than pending is final. */
export type TerminalStatus = Exclude<InvitationStatus, "pending">;

export function isTerminal(status: InvitationStatus): status is TerminalStatus {
  return status !== "pending";
}
