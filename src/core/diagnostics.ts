export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type OutputFormat = "human" | "jsonl";

/** Sink for progress and result diagnostics. */
export type Logger = (d: Diagnostic) => void;

export const silentLogger: Logger = () => {};

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">
): Diagnostic {
  return { level, code, message, ...extra };
}

/**
 * Human: info on stdout, warn/error on stderr.
 * jsonl: every diagnostic as one JSON line on stdout.
 */
export function createReporter(format: OutputFormat): Logger {
  if (format === "jsonl") {
    return (d) => {
      process.stdout.write(JSON.stringify(d) + "\n");
    };
  }
  return (d) => {
    if (d.level === "info") {
      console.log(d.message);
    } else {
      console.error(d.level === "warn" ? `warning: ${d.message}` : d.message);
    }
  };
}
