import { createLogger } from '../src/logger';
import type { LogLevel } from '../src/config';

export interface LogSink {
  lines: Array<Record<string, unknown>>;
  write(msg: string): void;
}

export function createSink(): LogSink {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  };
}

export function testLogger(sink: LogSink, logLevel: LogLevel = 'debug', redact = true) {
  return createLogger({ logLevel, redact }, sink);
}

const ANSI = /\u001b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI, '');
}
