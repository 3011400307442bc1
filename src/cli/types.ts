/**
 * Flags parsed on the root `concierge` program and shared by every subcommand.
 */
export interface GlobalOptions {
  verbose: boolean;
  /** Machine-readable output; human text is suppressed */
  json: boolean;
}

/**
 * Output channel handed to each command action. Commands never write to the
 * console directly except for their `--json` payload.
 */
export interface CommandContext {
  options: GlobalOptions;
  /** Suppressed under --json */
  log: (message: string) => void;
  /** Only with --verbose */
  debug: (message: string) => void;
  /** Suppressed under --json */
  warn: (message: string) => void;
  /** Written as `{"error": ...}` under --json */
  error: (message: string) => void;
}
