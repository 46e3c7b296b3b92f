import Papa from "papaparse";
import { z } from "zod";

export type RowIssue = { row: number; message: string };

export type ParseReport<T> = {
  rows: T[];
  errors: RowIssue[];
  rowCount: number;
  droppedRows: number;
  unknownColumns: string[];
};

type HeaderMap = {
  columns: Map<string, string>; // source header -> canonical field
  unknown: string[];
};

// Earlier columns claim a field first; later aliases of it are ignored.
export function mapHeaders(headers: readonly string[], aliases: Record<string, PropertyKey>): HeaderMap {
  const columns = new Map<string, string>();
  const claimed = new Set<string>();
  const unknown: string[] = [];
  for (const header of headers) {
    const target = aliases[header.trim().toLowerCase()];
    if (target === undefined) {
      unknown.push(header.trim());
    } else if (!claimed.has(String(target))) {
      claimed.add(String(target));
      columns.set(header, String(target));
    }
  }
  return { columns, unknown };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}

export function parseCsvStream<T extends z.ZodRawShape>(
  text: string,
  schema: z.ZodObject<T>,
  aliases: Record<string, keyof z.infer<z.ZodObject<T>>>
): Promise<ParseReport<z.infer<z.ZodObject<T>>>> {
  const report: ParseReport<z.infer<z.ZodObject<T>>> = {
    rows: [],
    errors: [],
    rowCount: 0,
    droppedRows: 0,
    unknownColumns: [],
  };
  let headers: HeaderMap | null = null;

  // string input parses synchronously, so a throw inside step rejects the promise
  return new Promise((resolve) => {
    Papa.parse<Record<string, unknown>>(text, {
      header: true,
      skipEmptyLines: true,
      step: ({ data, meta }) => {
        if (!headers) {
          headers = mapHeaders(meta.fields ?? Object.keys(data), aliases);
          report.unknownColumns = headers.unknown;
        }
        report.rowCount += 1;

        const fields: Record<string, unknown> = {};
        for (const [header, field] of headers.columns) fields[field] = data[header];

        const parsed = schema.safeParse(fields);
        if (parsed.success) {
          report.rows.push(parsed.data);
        } else {
          report.droppedRows += 1;
          report.errors.push({ row: report.rowCount, message: formatIssues(parsed.error) });
        }
      },
      complete: () => resolve(report),
    });
  });
}
