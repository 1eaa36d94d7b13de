/**
 * Log callback passed into adapters and workflows.
 * Callers decide where lines go; adapters never print directly.
 */
export type LogCallback = (message: string, stream: "stdout" | "stderr") => void;

/** A callback that drops every line. */
export const noopLog: LogCallback = () => {};
