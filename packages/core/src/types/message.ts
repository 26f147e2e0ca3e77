// Conversation turns exchanged with the assistant

export type TurnRole = "user" | "assistant";

/** One role-tagged entry of a session's history. Never mutated once appended. */
export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
}

export function userTurn(content: string): Turn {
  return { role: "user", content };
}

export function assistantTurn(content: string): Turn {
  return { role: "assistant", content };
}
