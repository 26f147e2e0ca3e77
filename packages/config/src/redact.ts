import type { DocentConfig } from "./types";

const MASK = "***";

/** Copy of the config that is safe to log. */
export function redactConfig(config: DocentConfig): DocentConfig {
  return {
    ...config,
    apiKey: mask(config.apiKey),
    telegramBotToken: mask(config.telegramBotToken),
    assistant: { ...config.assistant, tools: [...config.assistant.tools] },
  };
}

function mask(secret: string): string {
  return secret.length > 8 ? `${secret.slice(0, 3)}${MASK}` : MASK;
}
