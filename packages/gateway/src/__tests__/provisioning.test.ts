import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ProvisioningError } from "@docent/core";
import { RecordingLogger } from "@docent/core/src/__fixtures__/recording-logger";
import { listDocuments, provision, type ProvisioningSettings } from "../provisioning";
import { FakeAssistants } from "../__fixtures__/fakes";

describe("provisioning", () => {
  let dir: string;
  let client: FakeAssistants;
  let logger: RecordingLogger;
  let settings: ProvisioningSettings;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "docent-docs-"));
    await writeFile(join(dir, "b.md"), "# Team");
    await writeFile(join(dir, "a.txt"), "About us");
    await writeFile(join(dir, "c.pdf"), "%PDF-1.4");
    await mkdir(join(dir, "nested"));
    await writeFile(join(dir, "nested", "skip.txt"), "not uploaded");

    client = new FakeAssistants();
    logger = new RecordingLogger();
    settings = {
      filesPath: dir,
      assistant: { name: "Docent", instructions: "Be helpful", model: "gpt-4o-mini", tools: ["file_search"] },
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("listDocuments returns regular files sorted by name", async () => {
    expect(await listDocuments(dir)).toEqual([join(dir, "a.txt"), join(dir, "b.md"), join(dir, "c.pdf")]);
  });

  test("creates the assistant, uploads every document and attaches the store", async () => {
    const result = await provision(client, settings, logger);

    expect(result).toEqual({
      assistantId: "asst_1",
      vectorStoreId: "vs_1",
      uploadedFiles: [join(dir, "a.txt"), join(dir, "b.md"), join(dir, "c.pdf")],
      skippedFiles: [],
    });
    expect(client.calls).toEqual([
      "createAssistant:Docent",
      "createVectorStore",
      `uploadFile:${join(dir, "a.txt")}`,
      "addFileToVectorStore:vs_1:file_1",
      `uploadFile:${join(dir, "b.md")}`,
      "addFileToVectorStore:vs_1:file_2",
      `uploadFile:${join(dir, "c.pdf")}`,
      "addFileToVectorStore:vs_1:file_3",
      "attachVectorStore:asst_1:vs_1",
    ]);
  });

  test("skips a document that fails to upload", async () => {
    client.failingUploads.add(join(dir, "b.md"));

    const result = await provision(client, settings, logger);

    expect(result.uploadedFiles).toEqual([join(dir, "a.txt"), join(dir, "c.pdf")]);
    expect(result.skippedFiles).toEqual([join(dir, "b.md")]);
    expect(client.calls).toContain("attachVectorStore:asst_1:vs_1");

    const [entry] = logger.at("error");
    expect(entry.message).toBe("Skipping document");
    expect(entry.data.path).toBe(join(dir, "b.md"));
    expect(entry.data.error).toBe(`upload rejected: ${join(dir, "b.md")}`);
  });

  test("succeeds with an empty documents directory", async () => {
    const empty = await mkdtemp(join(tmpdir(), "docent-empty-"));
    try {
      const result = await provision(client, { ...settings, filesPath: empty }, logger);
      expect(result.uploadedFiles).toEqual([]);
      expect(client.calls).toEqual(["createAssistant:Docent", "createVectorStore", "attachVectorStore:asst_1:vs_1"]);
    } finally {
      await rm(empty, { recursive: true, force: true });
    }
  });

  test("fails when the documents directory cannot be read", async () => {
    const missing = join(dir, "does-not-exist");

    const attempt = provision(client, { ...settings, filesPath: missing }, logger);

    await expect(attempt).rejects.toBeInstanceOf(ProvisioningError);
    await expect(attempt).rejects.toThrow(`Failed to read documents directory ${missing}`);
  });

  test.each([
    ["createAssistant", "Failed to create assistant: createAssistant rejected"],
    ["createVectorStore", "Failed to create vector store: createVectorStore rejected"],
    ["attachVectorStore", "Failed to attach vector store: attachVectorStore rejected"],
  ])("fails when %s is rejected", async (operation, expected) => {
    client.failOn = operation;

    const attempt = provision(client, settings, logger);

    await expect(attempt).rejects.toBeInstanceOf(ProvisioningError);
    await expect(attempt).rejects.toThrow(expected);
  });
});
