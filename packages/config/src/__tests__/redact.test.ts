import { describe, expect, test } from "vitest";
import { DocentConfigSchema } from "../schema";
import { redactConfig } from "../redact";

describe("redactConfig", () => {
  test("masks both secrets and leaves the original intact", () => {
    const config = DocentConfigSchema.parse({
      api_key: "test-secret-value",
      telegram_bot_token: "short",
    });

    const redacted = redactConfig(config);

    expect(redacted.apiKey).toBe("tes***");
    expect(redacted.telegramBotToken).toBe("***");
    expect(config.apiKey).toBe("test-secret-value");
    expect(redacted.assistant.tools).not.toBe(config.assistant.tools);
  });
});
