import { CsvFormatError, InvalidRecordError } from "../errors";
import { toProductRecord } from "../flyer-import/record-schema";
import type { ProductRecord } from "../types";
import { formatPrice } from "../util/money";
import { findBestDeals } from "./rank-deals";

export const RECORD_COLUMNS = [
  "retailer",
  "product_name",
  "category",
  "base_price",
  "final_price",
  "discount_pct",
  "is_promo",
  "source_file",
  "parsed_date",
] as const;

type RecordColumn = (typeof RECORD_COLUMNS)[number];

const NUMERIC_COLUMNS: ReadonlySet<string> = new Set(["base_price", "final_price", "discount_pct"]);

const quoteCsv = (value: string) =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

const formatCell = (record: ProductRecord, column: RecordColumn): string => {
  switch (column) {
    case "base_price":
    case "final_price":
      return formatPrice(record[column]);
    case "discount_pct":
      return String(Math.round(record.discount_pct));
    case "is_promo":
      return record.is_promo ? "true" : "false";
    case "parsed_date":
      return record.parsed_date.toISOString();
    default:
      return quoteCsv(record[column]);
  }
};

export const recordsToCsv = (records: readonly ProductRecord[]): string =>
  [
    RECORD_COLUMNS.join(","),
    ...records.map((record) => RECORD_COLUMNS.map((column) => formatCell(record, column)).join(",")),
  ].join("\n") + "\n";

/** RFC 4180 rows; quoted fields may hold commas, quotes and newlines. */
export const parseCsvRows = (csv: string): string[][] => {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < csv.length; i++) {
    const char = csv[i];
    if (inQuotes) {
      if (char === '"' && csv[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      row.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && csv[i + 1] === "\n") i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new CsvFormatError("Unterminated quoted field");
  }
  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows.filter((cells) => cells.length > 1 || cells[0] !== "");
};

export const recordsFromCsv = (csv: string): ProductRecord[] => {
  const [headerCells, ...rows] = parseCsvRows(csv);
  if (!headerCells) {
    return [];
  }
  // Spreadsheet exports prefix the first header cell with a byte order mark.
  const header = headerCells.map((cell) => cell.replace(/^\uFEFF/, "").trim());

  const missing = RECORD_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new CsvFormatError(`Missing columns: ${missing.join(", ")}`, 1);
  }

  return rows.map((cells, index) => {
    const line = index + 2;
    const fields: Record<string, unknown> = {};
    header.forEach((column, position) => {
      const cell = cells[position] ?? "";
      if (NUMERIC_COLUMNS.has(column)) {
        fields[column] = cell.trim() === "" ? Number.NaN : Number(cell);
      } else if (column === "is_promo") {
        fields[column] = cell.trim().toLowerCase() === "true";
      } else {
        fields[column] = cell;
      }
    });

    try {
      return toProductRecord(fields);
    } catch (error) {
      if (error instanceof InvalidRecordError) {
        throw new CsvFormatError(error.message, line);
      }
      throw error;
    }
  });
};

const RULE = "=".repeat(70);
const THIN_RULE = "-".repeat(70);

const formatTimestamp = (date: Date) => date.toISOString().slice(0, 16).replace("T", " ");

/** Plain-text guide: top 15 deals overall, then the top 5 of each category. */
export const buildShoppingGuide = (
  records: readonly ProductRecord[],
  fallbackCategory: string,
  now: Date = new Date(),
): string => {
  const lines: string[] = [
    RULE,
    "LIETUVOS MAISTO PREKYBOS APSIPIRKIMO VADOVAS",
    RULE,
    "",
    `Sugeneruota: ${formatTimestamp(now)}`,
    "",
    "GERIAUSI PASIŪLYMAI:",
    THIN_RULE,
  ];

  findBestDeals(records, { topN: 15 }).forEach((deal, index) => {
    lines.push(
      `${index + 1}. ${deal.product_name}`,
      `   ${deal.retailer} | ${formatPrice(deal.final_price)}€ (buvo ${formatPrice(deal.base_price)}€)`,
      `   Nuolaida: ${deal.discount_pct}% | Sutaupoma: ${formatPrice(deal.savings)}€`,
      "",
    );
  });

  lines.push("", RULE, "GERIAUSI PASIŪLYMAI PAGAL KATEGORIJAS:", RULE, "");

  const categories = [...new Set(records.map((record) => record.category))].sort();
  for (const category of categories) {
    if (category === fallbackCategory) continue;

    lines.push("", `${category}:`, THIN_RULE);
    for (const deal of findBestDeals(records, { category, topN: 5 })) {
      lines.push(
        `• ${deal.product_name}`,
        `  ${deal.retailer}: ${formatPrice(deal.final_price)}€ (-${deal.discount_pct}%)`,
      );
    }
  }

  lines.push("", RULE);
  return lines.join("\n") + "\n";
};
