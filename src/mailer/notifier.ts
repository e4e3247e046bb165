export interface InvitationMessage {
  to: string;
  projectName: string;
  inviterName: string;
  inviteUrl: string;
}

export type NotifyResult = { success: true } | { success: false; error: string };

/** Delivers invitation mail. Implementations report failure instead of throwing. */
export interface Notifier {
  sendInvitation(message: InvitationMessage): Promise<NotifyResult>;
}

export function inviteUrlFor(appUrl: string, token: string) {
  return `${appUrl.replace(/\/+$/, "")}/invitations/${encodeURIComponent(token)}`;
}
