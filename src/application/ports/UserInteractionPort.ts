/**
 * Port for questions answered by the human operator.
 */
export interface UserInteractionPort {
  ask(prompt: string, signal?: AbortSignal): Promise<string>;
}
