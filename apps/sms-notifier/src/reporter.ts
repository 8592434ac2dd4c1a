import type {
  ContactList,
  RunSummary,
  SendResult,
  SendStatus,
} from "@sms-notifier/shared";

export function summarize(list: ContactList, results: SendResult[]): RunSummary {
  return {
    totalRows: list.totalRows,
    skipped: list.skipped,
    results,
    notAttempted: list.contacts.length - results.length,
  };
}

export function count(results: readonly SendResult[], status: SendStatus) {
  return results.filter((r) => r.status === status).length;
}

export function failures(summary: RunSummary) {
  return summary.results.filter((r) => r.status === "failed");
}

export function formatReport(summary: RunSummary): string {
  const lines = [
    `rows read: ${summary.totalRows}`,
    `skipped: ${summary.skipped}`,
    `sent: ${count(summary.results, "sent")}`,
    `failed: ${count(summary.results, "failed")}`,
  ];
  if (summary.notAttempted > 0) {
    lines.push(`not attempted: ${summary.notAttempted}`);
  }

  const failed = failures(summary);
  if (failed.length > 0) {
    lines.push("failed numbers:");
    for (const { contact, detail } of failed) {
      const where = contact.row === undefined ? "" : ` (row ${contact.row})`;
      lines.push(`  ${contact.phoneNumber}${where}: ${detail}`);
    }
  }
  return lines.join("\n");
}
