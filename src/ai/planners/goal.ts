// src/ai/planners/goal.ts
import { decodeAssigned, decodeGoal } from "../results";
import { formatChatHistory, JSON_ONLY, type Generate, type HistoryLine } from "./shared";

const GOAL_PROMPT = `
You read a group chat and name the event or shopping goal the group is working towards,
for example "BBQ party this Saturday", "Friendsgiving dinner" or "Weekly grocery run".

Return JSON: {"goal": "<string>"}
If there is no clear goal return {"goal": ""}.
${JSON_ONLY}
`.trim();

/** "" when the chat has no recognisable goal. */
export async function extractGoal(generate: Generate, history: HistoryLine[]): Promise<string> {
  const raw = await generate([
    { role: "system", content: GOAL_PROMPT },
    { role: "user", content: `Chat history:\n${formatChatHistory(history)}\n\nExtract the goal.` },
  ]);
  return decodeGoal(raw);
}

const ASSIGNED_PROMPT = `
From the chat history, decide which of the listed members have already taken on a task.

Return JSON: {"assigned": ["name1", "name2"]}
Only use names from the member list. If nobody has a task, return an empty list.
${JSON_ONLY}
`.trim();

export async function extractAssignedMembers(
  generate: Generate,
  history: HistoryLine[],
  members: string[]
): Promise<string[]> {
  if (!members.length) return [];
  const raw = await generate([
    { role: "system", content: ASSIGNED_PROMPT },
    {
      role: "user",
      content: `Chat history:\n${formatChatHistory(history)}\n\nMember list: ${members.join(", ")}`,
    },
  ]);
  return decodeAssigned(raw, members);
}
