// src/ai/planners/inviteMatcher.ts
import { decodeInviteSuggestion, type InviteSuggestionResult } from "../results";
import { extractAssignedMembers, extractGoal } from "./goal";
import { formatChatHistory, JSON_ONLY, type Generate, type HistoryLine } from "./shared";

const SYSTEM_PROMPT = `
You help a group share out the work for an event or grocery task.

Return JSON:
{
  "suggested_invites": ["<available member name>"],
  "missing_roles": ["<kind of helper still needed>"],
  "narrative": "<friendly explanation>"
}
Never invent people: "suggested_invites" may only name available members. If more help
is needed than they can give, describe the helper in "missing_roles" (e.g. "someone to grill").
${JSON_ONLY}
`.trim();

export async function suggestInvites(
  generate: Generate,
  input: { history: HistoryLine[]; members: string[]; goal?: string | null }
): Promise<InviteSuggestionResult> {
  const goal = input.goal?.trim() || (await extractGoal(generate, input.history));
  const assigned = await extractAssignedMembers(generate, input.history, input.members);
  const available = input.members.filter((m) => !assigned.includes(m));

  const list = (xs: string[]) => (xs.length ? xs.join(", ") : "None");
  const raw = await generate([
    { role: "system", content: SYSTEM_PROMPT },
    {
      role: "user",
      content: [
        `Goal: ${goal || "(none detected)"}`,
        `All room members: ${list(input.members)}`,
        `Already assigned: ${list(assigned)}`,
        `Available for new tasks: ${list(available)}`,
        `Chat history:\n${formatChatHistory(input.history)}`,
      ].join("\n"),
    },
  ]);
  return decodeInviteSuggestion(raw, available);
}
