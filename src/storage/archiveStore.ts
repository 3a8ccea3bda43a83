import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { ContentKind } from "../types";

export interface StoredFile {
  /** Relative to the output directory, always with forward slashes. */
  storagePath: string;
  absolutePath: string;
  /** True when a file with this checksum was already present. */
  deduplicated: boolean;
}

const EXTENSIONS: Record<ContentKind, string> = {
  pdf: "pdf",
  tiff: "tif",
  jpeg: "jpg",
  png: "png",
};

export function extensionFor(kind: ContentKind | undefined): string {
  return kind ? EXTENSIONS[kind] : "bin";
}

export function contentAddressedPath(checksum: string, kind: ContentKind): string {
  return `archive/${checksum.slice(0, 2)}/${checksum}.${extensionFor(kind)}`;
}

function slugify(value: string): string {
  const slug = value
    .normalize("NFKD")
    .replace(/[^\w.-]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_|_$/g, "");
  return (slug || "item").slice(0, 80);
}

/**
 * Writes go to a uniquely named `.part` file that is fsynced and then renamed,
 * so readers only ever see complete files under their final name.
 */
async function writeAtomically(finalPath: string, bytes: Buffer): Promise<void> {
  await fs.promises.mkdir(path.dirname(finalPath), { recursive: true });
  const tempPath = `${finalPath}.${crypto.randomBytes(4).toString("hex")}.part`;
  const handle = await fs.promises.open(tempPath, "w");
  try {
    await handle.writeFile(bytes);
    await handle.sync();
  } finally {
    await handle.close();
  }

  try {
    await fs.promises.rename(tempPath, finalPath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

export class ArchiveStore {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  resolve(storagePath: string): string {
    return path.join(this.rootDir, ...storagePath.split("/"));
  }

  async store(bytes: Buffer, checksum: string, kind: ContentKind): Promise<StoredFile> {
    const storagePath = contentAddressedPath(checksum, kind);
    const absolutePath = this.resolve(storagePath);
    if (fs.existsSync(absolutePath)) {
      return { storagePath, absolutePath, deduplicated: true };
    }
    await writeAtomically(absolutePath, bytes);
    return { storagePath, absolutePath, deduplicated: false };
  }

  /** Keeps a payload that failed verification for later inspection; returns its relative path. */
  async quarantine(identifier: string, checksum: string, bytes: Buffer, kind?: ContentKind): Promise<string> {
    const storagePath = `quarantine/${slugify(identifier)}-${checksum.slice(0, 12)}.${extensionFor(kind)}`;
    const absolutePath = this.resolve(storagePath);
    if (!fs.existsSync(absolutePath)) {
      await writeAtomically(absolutePath, bytes);
    }
    return storagePath;
  }
}
