/**
 * Defines expected output format.
 */

export const OUTPUT_FORMAT_SECTION = `<output_format>
Always respond with one JSON object:
{
  "thinking": "reasoning about the current state, the history and what to do next",
  "evaluation_previous_goal": "one sentence: did the last action succeed, fail or is it uncertain",
  "memory": "1-3 sentences tracking progress",
  "next_goal": "the next immediate goal in one sentence",
  "action": "action_name",
  "input": {}
}
</output_format>`;
