export const DEFAULT_CONFIG_PATH = "config.yaml";

export const DEFAULT_API_URL = "https://api.openai.com/v1/";

export const DEFAULT_MODEL = "gpt-4o-mini";

export const DEFAULT_ASSISTANT_NAME = "Docent";

export const DEFAULT_MAX_CONTEXT_MESSAGES = 10;

export const DEFAULT_INSTRUCTIONS =
  "You are Docent, a guide to the company's activities. Answer questions using the attached " +
  "company documents. If the documents do not cover a question, say so instead of guessing.\n\n" +
  "Match the user's language. Keep answers short and concrete.";
