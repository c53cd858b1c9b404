import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import type { ConfigDocument } from "./patcher.js";
import { applyPatches, createDocument } from "./patcher.js";
import type { FieldPatch } from "./fields.js";
import { logger } from "../logger.js";

/** Template shipped with the installer, used when no document exists yet. */
export const BUNDLED_TEMPLATE_PATH = path.join(__dirname, "..", "..", "templates", "config.yaml");

export async function readTemplate(templatePath: string = BUNDLED_TEMPLATE_PATH): Promise<string> {
  return fs.readFile(templatePath, "utf-8");
}

export async function loadDocument(filePath: string): Promise<ConfigDocument> {
  return createDocument(await fs.readFile(filePath, "utf-8"));
}

/**
 * Write through a temp file in the target directory and rename over the
 * target, so readers see either the old document or the new one.
 */
export async function saveDocument(filePath: string, document: ConfigDocument): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`);
  try {
    await fs.writeFile(tmpPath, document.text, "utf-8");
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
  logger.debug({ filePath, fields: [...document.fields] }, "Config document saved");
}

/**
 * Apply every patch in memory, then persist once. Nothing is written when
 * any patch fails.
 */
export async function applyAndSave(filePath: string, sourceText: string, patches: readonly FieldPatch[]): Promise<ConfigDocument> {
  const patched = applyPatches(createDocument(sourceText), patches);
  await saveDocument(filePath, patched);
  return patched;
}
