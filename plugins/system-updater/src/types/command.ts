/**
 * A structured external command ready for execution.
 * Managers never build raw shell strings; they produce Command objects and
 * hand them to the ExecutionAdapter.
 */
export interface Command {
  readonly argv: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
}

/** Render a command for logs and error messages. */
export function formatCommand(command: Command): string {
  return command.argv.join(" ");
}
