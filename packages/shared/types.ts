// Single source of truth for domain types shared by the notifier.
export type SendStatus = "sent" | "failed";

export interface Contact {
  phoneNumber: string; // trimmed, otherwise as written in the sheet
  name?: string;
  email?: string;
  row?: number; // 1-based spreadsheet row; absent for a --destination number
}

export interface SendResult {
  contact: Contact;
  status: SendStatus;
  detail: string; // provider message id, or error text
}

export interface EmailSettings {
  from: string;
  password: string;
  smtpHost: string;
  smtpPort: number;
  subject: string;
  successBody: string;
  errorBody: string;
}

export interface NotifierConfig {
  apiKey: string;
  apiSecret: string;
  title?: string;
  body: string;
  sender: string;
  destination?: string;
  email?: EmailSettings;
}

export interface ContactList {
  contacts: Contact[];
  skipped: number;
  totalRows: number;
}

export interface RunSummary {
  totalRows: number;
  skipped: number;
  results: SendResult[];
  notAttempted: number;
}
