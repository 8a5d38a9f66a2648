// Plain comma-separated rows, the layout the run tooling writes: no quoting, no embedded commas.

export function splitRows(text: string): string[] {
  const rows = text.replace(/\r/g, "").split("\n");
  while (rows.length > 0 && rows[rows.length - 1] === "") rows.pop();
  return rows;
}

export function splitFields(row: string): string[] {
  return row.split(",");
}

export function joinFields(fields: readonly string[]): string {
  return fields.join(",");
}

export function renderRows(rows: readonly string[]): string {
  return rows.length === 0 ? "" : `${rows.join("\n")}\n`;
}
