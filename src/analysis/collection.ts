import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { ANALYSIS_CONFIG } from "./config.js";
import { TaskDescriptorError } from "./errors.js";
import { parseTaskInput, type TaskInput } from "./task-input.js";

export interface CollectionDocument {
  documentId: string;
  filePath: string;
}

export interface ScanResult {
  found: CollectionDocument[];
  missing: string[];
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export async function loadTaskInput(collectionDir: string): Promise<TaskInput> {
  const inputPath = path.join(collectionDir, ANALYSIS_CONFIG.inputFileName);
  let data: string;
  try {
    data = await readFile(inputPath, "utf-8");
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new TaskDescriptorError(`Cannot read task input at ${inputPath}: ${msg}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new TaskDescriptorError(`Task input at ${inputPath} is not valid JSON: ${msg}`);
  }
  return parseTaskInput(json);
}

/** Resolves the input's documents against <collection>/PDFs, keeping input order. */
export async function scanCollection(
  collectionDir: string,
  documents: TaskInput["documents"],
): Promise<ScanResult> {
  const pdfDir = path.join(collectionDir, ANALYSIS_CONFIG.pdfDirName);
  const result: ScanResult = { found: [], missing: [] };

  for (const doc of documents) {
    const filePath = path.join(pdfDir, doc.filename);
    if (await isFile(filePath)) {
      result.found.push({ documentId: doc.filename, filePath });
    } else {
      result.missing.push(doc.filename);
    }
  }

  return result;
}
