// Contact Reader: turns the first sheet of an .xlsx/.csv file into an ordered
// contact list. Row 1 is the header; the columns we look at are
//
//   Phone (required) | Name | Surname | Email
//
// matched case-insensitively. Everything else in the sheet is ignored.
import path from "node:path";
import ExcelJS, { type CellValue, type Worksheet } from "exceljs";
import {
  InputError,
  type Contact,
  type ContactList,
} from "@sms-notifier/shared";
import { silentLogger, type Logger } from "./logger.js";

export const PHONE_COLUMN = "phone";

type Columns = {
  phone: number;
  name?: number;
  surname?: number;
  email?: number;
};

/** Text content of a cell, trimmed; undefined for blanks and non-text values. */
export function cellText(value: CellValue): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? undefined : trimmed;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return undefined;
    // Phone numbers typed into Excel usually come back as plain numbers
    return Number.isInteger(value) ? value.toFixed(0) : String(value);
  }
  if (value && typeof value === "object" && !(value instanceof Date)) {
    if ("richText" in value) {
      return cellText(value.richText.map((part) => part.text).join(""));
    }
    if ("hyperlink" in value) return cellText(value.text);
    if ("result" in value) return cellText(value.result);
  }
  // dates, booleans, #N/A and friends
  return undefined;
}

function locateColumns(sheet: Worksheet, file: string): Columns {
  const byName = new Map<string, number>();
  sheet.getRow(1).eachCell((cell, col) => {
    const label = cellText(cell.value)?.toLowerCase();
    if (label && !byName.has(label)) byName.set(label, col);
  });

  const phone = byName.get(PHONE_COLUMN);
  if (phone === undefined) {
    throw new InputError(
      `${file}: no "Phone" column in the header row (found: ${
        [...byName.keys()].join(", ") || "nothing"
      })`,
    );
  }
  return {
    phone,
    name: byName.get("name"),
    surname: byName.get("surname"),
    email: byName.get("email"),
  };
}

async function openSheet(file: string): Promise<Worksheet> {
  const ext = path.extname(file).toLowerCase();
  if (ext !== ".xlsx" && ext !== ".csv") {
    throw new InputError(
      `${file}: unsupported spreadsheet format "${ext || "none"}" (expected .xlsx or .csv)`,
    );
  }

  const workbook = new ExcelJS.Workbook();
  try {
    if (ext === ".csv") {
      // keep every cell as written; the default mapper turns "+1555..." into a number
      return await workbook.csv.readFile(file, { map: (value: unknown) => value });
    }
    await workbook.xlsx.readFile(file);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputError(`${file}: cannot open spreadsheet: ${reason}`, {
      cause: err,
    });
  }

  const sheet = workbook.worksheets[0];
  if (!sheet) throw new InputError(`${file}: workbook has no worksheets`);
  return sheet;
}

function hasValue(value: CellValue) {
  if (value === null || value === undefined) return false;
  return typeof value !== "string" || value.trim() !== "";
}

/** Last row with any non-blank cell; trailing blank lines in a CSV are rows too. */
function lastDataRow(sheet: Worksheet) {
  for (let r = sheet.rowCount; r > 1; r--) {
    const row = sheet.getRow(r);
    for (let c = 1; c <= row.cellCount; c++) {
      if (hasValue(row.getCell(c).value)) return r;
    }
  }
  return 1;
}

export async function readContacts(
  file: string,
  logger: Logger = silentLogger,
): Promise<ContactList> {
  const sheet = await openSheet(file);
  const columns = locateColumns(sheet, file);

  const contacts: Contact[] = [];
  let skipped = 0;

  const last = lastDataRow(sheet);
  for (let r = 2; r <= last; r++) {
    const row = sheet.getRow(r);
    const text = (col?: number) =>
      col === undefined ? undefined : cellText(row.getCell(col).value);

    const phoneNumber = text(columns.phone);
    if (!phoneNumber) {
      skipped++;
      logger.debug({ row: r }, "no phone number → skipping row");
      continue;
    }

    const contact: Contact = { phoneNumber, row: r };
    const name = [text(columns.name), text(columns.surname)]
      .filter(Boolean)
      .join(" ");
    if (name) contact.name = name;
    const email = text(columns.email);
    if (email) contact.email = email;
    contacts.push(contact);
  }

  logger.info(
    { file, contacts: contacts.length, skipped },
    "contacts loaded",
  );
  return { contacts, skipped, totalRows: contacts.length + skipped };
}
