// src/ai/planners/groupPlanner.ts
import { decodeGroupPlan, type GroupPlanResult } from "../results";
import { extractGoal } from "./goal";
import { formatChatHistory, JSON_ONLY, type Generate, type HistoryLine } from "./shared";

const SYSTEM_PROMPT = `
You help a group plan an event or a grocery trip.

Return JSON:
{
  "event": "<string>",
  "summary": "<short summary>",
  "items": [{"name": "<string>", "assigned_to": "<member or Unassigned>"}],
  "timeline": ["<step>", "<step>"],
  "narrative": "<friendly, conversational explanation>"
}
Assign items to listed members where it fits, otherwise use "Unassigned".
${JSON_ONLY}
`.trim();

export async function generateGroupPlan(
  generate: Generate,
  input: { history: HistoryLine[]; members: string[]; goal?: string | null }
): Promise<GroupPlanResult> {
  const goal = input.goal?.trim() || (await extractGoal(generate, input.history));
  const raw = await generate([
    { role: "system", content: SYSTEM_PROMPT },
    {
      role: "user",
      content: [
        `Goal: ${goal || "(none detected)"}`,
        `Room members: ${input.members.length ? input.members.join(", ") : "None"}`,
        `Chat history:\n${formatChatHistory(input.history)}`,
      ].join("\n\n"),
    },
  ]);
  return decodeGroupPlan(raw, goal);
}
