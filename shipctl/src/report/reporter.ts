export type DiagnosticLevel = "error" | "warn" | "info" | "debug";

export type Diagnostic = {
  level: DiagnosticLevel;
  code: string;
  message: string;
  step?: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type OutputFormat = "human" | "jsonl";

export function diag(
  level: DiagnosticLevel,
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "step" | "path" | "details">
): Diagnostic {
  return { level, code, message, ...extra };
}

export type ReporterSink = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

const processSink: ReporterSink = {
  stdout: (line) => process.stdout.write(line + "\n"),
  stderr: (line) => process.stderr.write(line + "\n"),
};

/**
 * Writes diagnostics either as plain lines (human) or one JSON object per
 * line on stdout (jsonl). Debug diagnostics are dropped unless enabled.
 */
export class Reporter {
  readonly format: OutputFormat;
  readonly debugEnabled: boolean;
  private readonly sink: ReporterSink;

  constructor(opts: { format?: OutputFormat; debug?: boolean; sink?: ReporterSink } = {}) {
    this.format = opts.format ?? "human";
    this.debugEnabled = opts.debug ?? false;
    this.sink = opts.sink ?? processSink;
  }

  emit(d: Diagnostic): void {
    if (d.level === "debug" && !this.debugEnabled) return;

    if (this.format === "jsonl") {
      this.sink.stdout(JSON.stringify(d));
      return;
    }

    switch (d.level) {
      case "error":
        this.sink.stderr(d.message);
        break;
      case "warn":
        this.sink.stderr(`warning: ${d.message}`);
        break;
      default:
        this.sink.stdout(d.message);
    }
  }

  emitAll(diagnostics: Diagnostic[]): void {
    for (const d of diagnostics) this.emit(d);
  }

  /** Structured payload: JSON in jsonl mode, pretty-printed otherwise. */
  result(payload: Record<string, unknown>, human?: string): void {
    if (this.format === "jsonl") {
      this.sink.stdout(JSON.stringify({ level: "info", code: "OK", ...payload }));
    } else {
      this.sink.stdout(human ?? JSON.stringify(payload, null, 2));
    }
  }
}
