/**
 * Explains the history block of the user message.
 */

export const AGENT_HISTORY_SECTION = `<agent_history>
Previous steps are listed as:
<step_N>:
Evaluation of Previous Step: assessment of the last action
Memory: progress notes for this step (e.g. "processed item 2/10")
Next Goal: the goal of this step
Action Results: the action and its result
</step_N>

Use the Memory fields to track what is done and avoid repeating actions.
</agent_history>`;
