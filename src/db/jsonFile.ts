import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import type { z } from "zod";

export function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Reads and validates a JSON document from disk.
 * A missing file yields the fallback; anything else (unreadable file, invalid JSON,
 * schema mismatch) is thrown to the caller so the run aborts.
 * @param filePath - Location of the JSON file
 * @param schema - zod schema the parsed document must satisfy
 * @param fallback - Value returned when the file does not exist yet
 * @returns The validated document
 */
export async function readJsonFile<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
  fallback: () => z.output<S>
): Promise<z.output<S>> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (err: unknown) {
    if (isMissingFileError(err)) return fallback();
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new Error(`Invalid JSON in ${filePath}`, { cause: err });
  }

  return schema.parse(parsed);
}

/**
 * Overwrites a JSON document, creating parent directories as needed.
 * Output is pretty-printed with two-space indentation and a trailing newline.
 */
export async function writeJsonFile(
  filePath: string,
  data: unknown
): Promise<void> {
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
}
