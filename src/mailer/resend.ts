//src/mailer/resend.ts
import { Resend } from "resend";
import env from "../config/env";
import { InvitationMessage, Notifier, NotifyResult } from "./notifier";

function escapeHtml(value: string) {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function renderInvitationEmail({ projectName, inviterName, inviteUrl }: InvitationMessage) {
  const project = escapeHtml(projectName);
  const inviter = escapeHtml(inviterName);
  const url = escapeHtml(inviteUrl);

  const html = `
    <div style="font-family: Arial, sans-serif; line-height:1.6;">
      <h2>You've been invited to collaborate on ${project}</h2>
      <p>${inviter} has invited you to join the project.</p>
      <p style="text-align:center;margin:32px 0;">
        <a href="${url}"
           style="background:#007bff;color:white;padding:10px 20px;border-radius:6px;text-decoration:none;">
           View Invitation
        </a>
      </p>
      <p>If the button doesn’t work, copy and paste this link in your browser:</p>
      <p><a href="${url}">${url}</a></p>
    </div>
  `;

  const text = `You have been invited to collaborate on ${projectName}. Visit: ${inviteUrl}`;

  return { subject: `Invitation to collaborate on ${projectName}`, html, text };
}

export class ResendNotifier implements Notifier {
  private client: Resend | null = null;

  constructor(
    private readonly apiKey: string = env.RESEND_API_KEY,
    private readonly from: string = env.MAIL_FROM
  ) {}

  async sendInvitation(message: InvitationMessage): Promise<NotifyResult> {
    if (!this.apiKey) {
      return { success: false, error: "Mail delivery is not configured" };
    }
    this.client ??= new Resend(this.apiKey);

    const { subject, html, text } = renderInvitationEmail(message);
    try {
      const { error } = await this.client.emails.send({ from: this.from, to: message.to, subject, html, text });
      if (error) return { success: false, error: error.message };
      return { success: true };
    } catch (err) {
      return { success: false, error: err instanceof Error ? err.message : "Unknown error" };
    }
  }
}
