export type LogSink = (line: string) => void;

const DEBUG_ENABLED = process.env["RASTERCAR_DEBUG"] === "1";

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

class Logger {
  private enabled: boolean;
  private sink: LogSink = stderrSink;

  constructor() {
    this.enabled = DEBUG_ENABLED;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /** Redirects output; returns the previous sink so callers can restore it. */
  setSink(sink: LogSink): LogSink {
    const previous = this.sink;
    this.sink = sink;
    return previous;
  }

  log(category: string, message: string, data?: unknown): void {
    if (!this.enabled) return;

    const timestamp = new Date().toISOString();
    const logLine =
      data === undefined
        ? `[${timestamp}] [${category}] ${message}\n`
        : `[${timestamp}] [${category}] ${message} ${JSON.stringify(data)}\n`;

    this.sink(logLine);
  }

  warn(category: string, message: string, data?: unknown): void {
    this.log(`${category}:WARN`, message, data);
  }
}

export const logger = new Logger();
