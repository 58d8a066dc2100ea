/**
 * When and how to finish.
 */

export const TASK_COMPLETION_SECTION = `<task_completion>
Call the finish action when:
- the user request is fully completed;
- you reached the last allowed step, even if the task is incomplete;
- it is impossible to continue.

finish requires "input": {"message": "..."}. The message describes what was done, the results, and anything left for the user.
</task_completion>`;
