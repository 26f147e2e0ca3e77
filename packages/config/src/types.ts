import type { z } from "zod";
import type { DocentConfigSchema } from "./schema";

/** Validated configuration, as handed to the gateway at construction. */
export type DocentConfig = z.output<typeof DocentConfigSchema>;

/** config.yaml contents before validation. */
export type DocentConfigInput = z.input<typeof DocentConfigSchema>;

export type AssistantSettings = DocentConfig["assistant"];
