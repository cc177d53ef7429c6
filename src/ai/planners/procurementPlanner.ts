// src/ai/planners/procurementPlanner.ts
import { decodeProcurementPlan, type ProcurementPlanResult } from "../results";
import { extractGoal } from "./goal";
import { formatChatHistory, JSON_ONLY, type Generate, type HistoryLine } from "./shared";

const SYSTEM_PROMPT = `
You turn a group chat into one consolidated shopping list.

Rules:
1. Conflicts: if someone asks for an item and someone else says it is not needed or
   already at home, leave it out.
2. Quantities: merge requests for the same item ("buy 2 apples" + "3 more" = "5 apples").
3. Give every item a category such as Produce, Dairy, Meat or Household.
4. Ignore chit-chat; only list items someone actually asked to buy.

Return JSON:
{
  "goal": "<event or goal>",
  "summary": "<one sentence>",
  "narrative": "<friendly explanation of what was decided>",
  "items": [
    { "name": "<item>", "quantity": "<e.g. 2 packs>", "category": "<category>", "notes": "<who asked, brand>" }
  ]
}
${JSON_ONLY}
`.trim();

/** Works from chat history only; no inventory, no catalog. */
export async function generateProcurementPlan(
  generate: Generate,
  history: HistoryLine[]
): Promise<ProcurementPlanResult> {
  const goal = await extractGoal(generate, history);
  const raw = await generate([
    { role: "system", content: SYSTEM_PROMPT },
    {
      role: "user",
      content: JSON.stringify({ inferred_goal: goal, chat_history_text: formatChatHistory(history) }, null, 2),
    },
  ]);
  return decodeProcurementPlan(raw, goal);
}
