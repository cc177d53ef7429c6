// src/pipeline/triggers.ts

export const TRIGGERS = {
  inventory: "@inventory",
  analysis: "@gro analyze",
  menu: "@gro menu",
  restock: "@gro restock",
  plan: "@gro plan",
  mention: "@gro",
} as const;

export type CommandKind = keyof typeof TRIGGERS | "none";

// first match wins
const PRIORITY: Exclude<CommandKind, "none">[] = ["inventory", "analysis", "menu", "restock", "plan", "mention"];

export function classifyCommand(body: string): CommandKind {
  const t = (body || "").toLowerCase();
  for (const kind of PRIORITY) {
    if (t.includes(TRIGGERS[kind])) return kind;
  }
  return "none";
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Removes every occurrence of `token` (any casing) and trims the rest. */
export function stripToken(body: string, token: string): string {
  return body.replace(new RegExp(escapeRegExp(token), "gi"), "").trim();
}

export const HELP_TEXT = [
  "Hi! Here is what I can do:",
  `• ${TRIGGERS.inventory} – update your stock (one "name, stock, safety_stock" per line)`,
  `• ${TRIGGERS.analysis} – check which items are running low`,
  `• ${TRIGGERS.menu} – dishes you can cook with what you have`,
  `• ${TRIGGERS.restock} – a restock plan for low items`,
  `• ${TRIGGERS.plan} – a shopping list from this chat`,
  `• ${TRIGGERS.mention} <question> – ask me anything`,
].join("\n");
