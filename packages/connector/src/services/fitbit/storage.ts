/**
 * Fitbit - Dataset storage
 *
 * Each retrieval run gets its own directory:
 *   <baseDir>/<account>/<YYYY-MM-DD_HH-MM-SS>/
 *     fitbit_data.json   raw bundle
 *     fitbit_data.txt    one "key: value" line per bundle key
 *     *.csv              processed tables
 */

import type { Dirent } from "node:fs";
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { setupLogger } from "../../lib/logger.js";
import { PayloadDecodeError } from "../../lib/errors.js";
import type { Table } from "./merge.js";
import type { CellValue, RawBundle } from "./types.js";

const logger = setupLogger("fitbit-storage");

export const BUNDLE_FILE = "fitbit_data.json";
export const TEXT_FILE = "fitbit_data.txt";

const payloadList = z.array(z.unknown()).default([]);

const BundleSchema = z.object({
  device_id: z.string().min(1),
  steps: payloadList,
  heart: payloadList,
  calories: payloadList,
  sleep: payloadList,
  spo2: payloadList,
  rate: payloadList,
});

// =============================================================================
// Formatting
// =============================================================================

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local time as YYYY-MM-DD_HH-MM-SS.
 */
export function datasetTimestamp(now: Date): string {
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
  return `${date}_${time}`;
}

export function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "boolean") return value ? "True" : "False";

  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Header line plus one line per row. Missing cells are empty.
 * A table without columns is an empty file.
 */
export function toCsv(table: Table): string {
  if (table.columns.length === 0) return "";
  const lines = [table.columns.map(formatCell).join(",")];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => formatCell(row[column])).join(","));
  }
  return lines.join("\n") + "\n";
}

export function toText(data: Readonly<Record<string, unknown>>): string {
  return Object.entries(data)
    .map(([key, value]) => `${key}: ${typeof value === "string" ? value : JSON.stringify(value)}\n`)
    .join("");
}

// =============================================================================
// DataStorage
// =============================================================================

export class DataStorage {
  readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  /**
   * Create a fresh timestamped dataset directory.
   */
  static async create(baseDir: string, account: string, now: Date = new Date()): Promise<DataStorage> {
    const dataDir = join(baseDir, account, datasetTimestamp(now));
    await mkdir(dataDir, { recursive: true });
    logger.debug(`Dataset directory: ${dataDir}`);
    return new DataStorage(dataDir);
  }

  private async write(filename: string, content: string, label: string): Promise<string> {
    const filepath = join(this.dataDir, filename);
    await writeFile(filepath, content, "utf-8");
    logger.info(`${label} saved to ${filepath}`);
    return filepath;
  }

  async saveJson(data: unknown, filename: string = BUNDLE_FILE): Promise<string> {
    return this.write(filename, JSON.stringify(data, null, 4), "JSON data");
  }

  async saveText(data: Readonly<Record<string, unknown>>, filename: string = TEXT_FILE): Promise<string> {
    return this.write(filename, toText(data), "Text data");
  }

  async saveCsv(table: Table, filename: string): Promise<string> {
    return this.write(filename, toCsv(table), "Data");
  }
}

// =============================================================================
// Datasets
// =============================================================================

/**
 * Dataset directories of an account, oldest first.
 * A missing account directory has no datasets.
 */
export async function listDatasets(baseDir: string, account: string): Promise<string[]> {
  const accountDir = join(baseDir, account);
  let entries: Dirent[];
  try {
    entries = await readdir(accountDir, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      logger.info("No datasets available.");
      return [];
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(accountDir, name));
}

/**
 * Read and validate a saved bundle.
 *
 * @throws Error if the dataset has no bundle file
 * @throws PayloadDecodeError if the file is not JSON or not a bundle
 */
export async function loadBundle(datasetDir: string): Promise<RawBundle> {
  const filepath = join(datasetDir, BUNDLE_FILE);

  let text: string;
  try {
    text = await readFile(filepath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new Error(`${BUNDLE_FILE} not found inside ${datasetDir}`);
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new PayloadDecodeError(filepath, error instanceof Error ? error.message : String(error));
  }

  const parsed = BundleSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new PayloadDecodeError(filepath, issues);
  }

  logger.info("Data loaded from local file successfully.");
  return parsed.data;
}
