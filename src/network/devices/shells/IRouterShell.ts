/**
 * IRouterShell - management plane of the simulated router
 *
 * The REPL feeds raw lines in and prints whatever comes back.
 */

export interface IRouterShell {
  /** Execute a raw command line and return the output ('' for none) */
  execute(rawInput: string): string;
  /** Current prompt string */
  getPrompt(): string;
  /** Complete a partial command, null when there is no unique completion */
  tabComplete(input: string): string | null;
  /** True once the user has asked to end the session */
  isClosed(): boolean;
}
