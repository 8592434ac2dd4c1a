import type { Contact, NotifierConfig } from "@sms-notifier/shared";

export type RenderedMessage = Readonly<{ sender: string; body: string }>;

export const NAME_TOKEN = "{name}";

/** The (sender, body) pair every contact receives. TITLE is not part of it. */
export function renderMessage(config: NotifierConfig): RenderedMessage {
  return Object.freeze({ sender: config.sender, body: config.body });
}

/**
 * Fills `{name}` with the contact's name. Without a name the token is
 * dropped along with the spaces right next to it, so "Hi {name}, ..." reads
 * "Hi, ...". The rest of the body is never touched.
 */
export function personalize(message: RenderedMessage, contact: Contact) {
  if (!message.body.includes(NAME_TOKEN)) return message.body;
  if (contact.name) return message.body.split(NAME_TOKEN).join(contact.name);

  return message.body.replace(
    / *\{name\}( *)/g,
    (match: string, after: string, offset: number, body: string) => {
      const before = match.slice(0, match.length - NAME_TOKEN.length - after.length);
      const next = body.charAt(offset + match.length);
      if (offset === 0 || next === "" || /[,.;:!?]/.test(next)) return "";
      return before && after ? " " : before + after;
    },
  );
}
