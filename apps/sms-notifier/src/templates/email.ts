import type { EmailSettings, SendResult } from "@sms-notifier/shared";

// Follow-up telling the contact whether the SMS made it.
export function renderConfirmationEmail(
  result: SendResult,
  settings: EmailSettings,
) {
  const { name } = result.contact;
  const lines = [
    name ? `Hello ${name},` : "Hello,",
    "",
    result.status === "sent" ? settings.successBody : settings.errorBody,
  ];
  return {
    subject: settings.subject,
    text: lines.join("\n"),
    html: lines.map((l) => `<p>${escapeHtml(l) || "&nbsp;"}</p>`).join(""),
  };
}

function escapeHtml(s: string) {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
