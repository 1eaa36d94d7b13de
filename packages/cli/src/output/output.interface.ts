import type { LogCallback } from "@etlctl/adapters-common";

/**
 * Terminal output used by command handlers.
 *
 * Results (`result`, `json`) go to stdout so they can be piped; decoration,
 * status lines and spinners go to stderr.
 */
export interface IOutputService {
  header(title: string, icon?: string): void;
  newline(): void;
  dim(text: string): void;
  success(text: string): void;
  warn(text: string): void;
  error(text: string): void;

  /** A line of command output on stdout */
  result(text: string): void;
  json(value: unknown): void;

  startSpinner(text: string): void;
  stopSpinner(): void;

  /** Log callback handed to services; stderr lines always print, stdout lines only in verbose mode */
  readonly log: LogCallback;
}
