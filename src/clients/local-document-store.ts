import fs from "node:fs/promises";
import path from "node:path";
import { config } from "../config/index.js";

export interface StoredDocumentEntry {
  /** Store key, relative to the store root, always with forward slashes. */
  id: string;
  raw: string;
}

export interface DocumentStore {
  listDocuments: (prefix: string) => Promise<StoredDocumentEntry[]>;
}

function resolveStoreRoot(configured: string): string {
  return path.isAbsolute(configured) ? configured : path.resolve(process.cwd(), configured);
}

const toStoreKey = (relativePath: string): string => relativePath.split(path.sep).join("/");

/**
 * Read-only document store backed by a directory of `.json` files. Each file
 * holds one document as written by the ingestion job.
 */
export function createLocalDocumentStore(rootDir: string = config.DOCUMENT_STORE_DIR): DocumentStore {
  const root = resolveStoreRoot(rootDir);

  return {
    async listDocuments(prefix) {
      const relativePaths = await fs.readdir(root, { recursive: true });
      const keys = relativePaths
        .filter((relativePath) => relativePath.endsWith(".json"))
        .map(toStoreKey)
        .filter((key) => key.startsWith(prefix))
        .sort();

      return Promise.all(
        keys.map(async (key) => ({
          id: key,
          raw: await fs.readFile(path.join(root, key), "utf8")
        }))
      );
    }
  };
}
