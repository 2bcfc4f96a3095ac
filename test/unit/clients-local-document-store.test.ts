import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLocalDocumentStore } from "../../src/clients/local-document-store.js";

describe("clients/local-document-store", () => {
  let root = "";

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "document-store-"));
    await fs.mkdir(path.join(root, "fiscal"), { recursive: true });
    await fs.mkdir(path.join(root, "social"), { recursive: true });
    await fs.writeFile(path.join(root, "fiscal", "tva.json"), '{"titre":"TVA"}', "utf8");
    await fs.writeFile(path.join(root, "fiscal", "is.json"), '{"titre":"IS"}', "utf8");
    await fs.writeFile(path.join(root, "fiscal", "notes.txt"), "ignored", "utf8");
    await fs.writeFile(path.join(root, "social", "paie.json"), '{"titre":"Paie"}', "utf8");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("lists json documents under a prefix in key order", async () => {
    const store = createLocalDocumentStore(root);

    await expect(store.listDocuments("fiscal/")).resolves.toEqual([
      { id: "fiscal/is.json", raw: '{"titre":"IS"}' },
      { id: "fiscal/tva.json", raw: '{"titre":"TVA"}' }
    ]);
  });

  it("lists every json document for an empty prefix", async () => {
    const store = createLocalDocumentStore(root);

    const documents = await store.listDocuments("");

    expect(documents.map((document) => document.id)).toEqual([
      "fiscal/is.json",
      "fiscal/tva.json",
      "social/paie.json"
    ]);
  });

  it("rejects when the store directory is missing", async () => {
    const store = createLocalDocumentStore(path.join(root, "absent"));

    await expect(store.listDocuments("")).rejects.toThrow(/ENOENT/);
  });
});
