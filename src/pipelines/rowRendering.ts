import { SourceRow } from "../infra/connectors/types.js";

/** `Table orders record: id=7, status=paid`. Null and undefined columns are left out. */
export function renderRow(table: string, row: SourceRow): string {
  const fields = Object.entries(row)
    .filter(([, value]) => value !== null && value !== undefined)
    .map(([column, value]) => `${column}=${formatValue(value)}`)
    .join(", ");
  return `Table ${table} record: ${fields}`;
}

export function rowIdentifier(row: SourceRow): string | null {
  const id = row.id;
  if (id === null || id === undefined) {
    return null;
  }
  return formatValue(id);
}

export function formatValue(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Buffer.isBuffer(value)) {
    return `<${value.length} bytes>`;
  }
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}
