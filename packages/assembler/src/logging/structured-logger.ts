export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StructuredLogEvent {
  readonly level: LogLevel;
  readonly name: string;
  readonly event: string;
  readonly data?: Readonly<Record<string, unknown>>;
}

/**
 * Sink for the assembler's diagnostic events.
 *
 * Event names used by this package:
 * - `handler.registered`, `handler.superseded`, `handler.unregistered`
 * - `dispatch.invoke`, `compatibility.skipped`, `decoration.skipped`
 * - `component.replaced`, `hook.failed`, `parse.completed`, `parse.failed`
 */
export interface StructuredLogger {
  log(entry: StructuredLogEvent): void;
}

/**
 * Writes every event as one line of JSON with an ISO timestamp.
 */
export class JsonLineLogger implements StructuredLogger {
  constructor(private readonly output: { write(line: string): void }) {}

  log(entry: StructuredLogEvent): void {
    const payload = JSON.stringify({
      ...entry,
      timestamp: new Date().toISOString(),
    });
    this.output.write(`${payload}\n`);
  }
}

export const noopLogger: StructuredLogger = {
  log() {
    // noop
  },
};
