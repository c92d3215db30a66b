/** Package version, reported by the CLI and REPL. */
export const VERSION = "0.1.0";
