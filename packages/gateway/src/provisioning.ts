// Startup provisioning: assistant, vector store, document uploads

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { ProvisioningError, errorMessage, type Logger } from "@docent/core";
import type { AssistantSettings } from "@docent/config";
import type { ProvisioningClient } from "@docent/provider-assistants";
import type { ProvisionedIds } from "./orchestrator";

export interface ProvisioningSettings {
  readonly assistant: AssistantSettings;
  readonly filesPath: string;
}

export interface ProvisionedAssistant extends ProvisionedIds {
  /** Paths that were uploaded and registered in the vector store. */
  readonly uploadedFiles: readonly string[];
  /** Paths whose upload or registration failed. */
  readonly skippedFiles: readonly string[];
}

/** Regular files directly inside `dir`, sorted by name. */
export async function listDocuments(dir: string): Promise<string[]> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (cause) {
    throw new ProvisioningError(`Failed to read documents directory ${dir}: ${errorMessage(cause)}`, cause);
  }
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}

async function step<T>(description: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (cause) {
    throw new ProvisioningError(`Failed to ${description}: ${errorMessage(cause)}`, cause);
  }
}

/**
 * Create the assistant and a vector store holding every document in
 * `filesPath`, then attach the store to the assistant.
 *
 * A document that fails to upload or register is logged and skipped.
 * Any other failure throws ProvisioningError.
 */
export async function provision(
  client: ProvisioningClient,
  settings: ProvisioningSettings,
  logger: Logger,
): Promise<ProvisionedAssistant> {
  const log = logger.child({ component: "provisioning" });

  const assistantId = await step("create assistant", () => client.createAssistant(settings.assistant));
  const vectorStoreId = await step("create vector store", () => client.createVectorStore());

  const documents = await listDocuments(settings.filesPath);
  log.info("Uploading documents", { filesPath: settings.filesPath, count: documents.length });

  const uploadedFiles: string[] = [];
  const skippedFiles: string[] = [];
  for (const path of documents) {
    try {
      const fileId = await client.uploadFile(path);
      await client.addFileToVectorStore(vectorStoreId, fileId);
      uploadedFiles.push(path);
    } catch (error) {
      log.error("Skipping document", { path, error: errorMessage(error) });
      skippedFiles.push(path);
    }
  }

  await step("attach vector store", () => client.attachVectorStore(assistantId, vectorStoreId));

  log.info("Assistant ready", {
    assistantId,
    vectorStoreId,
    uploaded: uploadedFiles.length,
    skipped: skippedFiles.length,
  });
  return { assistantId, vectorStoreId, uploadedFiles, skippedFiles };
}
