import { promises as fs } from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import type { FileType, RawDocument } from "@lexrag/core";

export const IGNORED_DIRS = new Set([".git", "node_modules", "dist", "coverage", ".data"]);

function sha256(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

export function inferFileType(filePath: string): FileType | null {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".md" || ext === ".markdown") return "markdown";
  if (ext === ".txt") return "text";
  return null;
}

/** Stable across runs: derived from the path relative to the corpus root. */
export function documentIdFor(relPath: string): string {
  return sha256(`document:${relPath}`).slice(0, 32);
}

async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const ent of entries) {
    if (ent.isDirectory()) {
      if (IGNORED_DIRS.has(ent.name)) continue;
      await walk(path.join(dir, ent.name), out);
    } else if (ent.isFile()) {
      out.push(path.join(dir, ent.name));
    }
  }
}

export async function loadDocuments(params: { dir: string }): Promise<RawDocument[]> {
  const root = path.resolve(params.dir);
  const files: string[] = [];
  await walk(root, files);

  const docs: RawDocument[] = [];
  for (const absPath of files) {
    const fileType = inferFileType(absPath);
    if (!fileType) continue;

    const content = await fs.readFile(absPath, "utf8");
    const relPath = path.relative(root, absPath).replaceAll("\\", "/");

    docs.push({ id: documentIdFor(relPath), filename: relPath, fileType, content });
  }

  return docs;
}
