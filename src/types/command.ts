/**
 * A structured native command ready for execution.
 * Lifecycle code never builds raw command strings; it asks a HostCommands
 * implementation for Command objects.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
}

/** Render a Command for logs and error messages. */
export function describeCommand(command: Command): string {
  return command.argv.map((a) => (/\s/.test(a) ? `"${a}"` : a)).join(" ");
}
