/**
 * Minimal RFC 4180 reader and writer: quoted fields, doubled quotes,
 * CRLF or LF line ends, newlines inside quotes.
 */

export function parseDelimited(text: string, delimiter = ","): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  for (let i = 0; i < input.length; i += 1) {
    const char = input[i];

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && field === "") {
      inQuotes = true;
    } else if (char === delimiter) {
      row.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && input[i + 1] === "\n") {
        i += 1;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += char;
    }
  }

  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows.filter((cells) => cells.some((cell) => cell.trim() !== ""));
}

/** Rows keyed by the header row; header names are trimmed and lower-cased. */
export function parseDelimitedRecords(text: string, delimiter = ","): Array<Record<string, string>> {
  const [header, ...body] = parseDelimited(text, delimiter);
  if (!header) {
    return [];
  }
  const keys = header.map((key) => key.trim().toLowerCase());
  return body.map((cells) => {
    const record: Record<string, string> = {};
    keys.forEach((key, index) => {
      record[key] = cells[index] ?? "";
    });
    return record;
  });
}

function formatField(value: unknown, delimiter: string): string {
  if (value === undefined || value === null) {
    return "";
  }
  const text = String(value);
  if (text.includes('"') || text.includes(delimiter) || text.includes("\n") || text.includes("\r")) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatDelimited(header: readonly string[], rows: ReadonlyArray<readonly unknown[]>, delimiter = ","): string {
  const lines = [header, ...rows].map((row) => row.map((value) => formatField(value, delimiter)).join(delimiter));
  return `${lines.join("\n")}\n`;
}
