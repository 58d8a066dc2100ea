/**
 * One action per step.
 */

export const ACTION_RULES_SECTION = `<action_rules>
- Use exactly ONE action per step. Do not use multi_tool_use.parallel.
- Do not chain state-changing actions; you need to see whether each one worked.
- Do not wait after clicking, submitting or navigating. The next step shows the new page state.
</action_rules>`;
