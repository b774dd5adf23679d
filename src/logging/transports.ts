/**
 * Logging Transports
 *
 * Winston transport wrappers. Text lines look like:
 * INFO  2026-10-18 14:30:15,042 [relay-engine] Study delivered
 */

import winston from 'winston';

export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

/**
 * Format a Date as yyyy-MM-dd HH:mm:ss,SSS in local time
 */
export function formatLocalTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const millis = String(date.getMilliseconds()).padStart(3, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds},${millis}`;
}

/**
 * Render one log record as a text line (plus the stack, when present).
 */
export function formatTextLine(
  info: { level: string; message: unknown; [key: string]: unknown },
  timestampFormat: 'local' | 'iso',
  now: Date = new Date()
): string {
  const level = info.level.toUpperCase().padEnd(5);
  const component = typeof info['component'] === 'string' ? info['component'] : undefined;
  const timestamp = timestampFormat === 'iso' ? now.toISOString() : formatLocalTimestamp(now);
  const componentPart = component ? ` [${component}]` : '';
  let line = `${level} ${timestamp}${componentPart} ${String(info.message)}`;
  if (typeof info['errorStack'] === 'string') {
    line += '\n' + info['errorStack'];
  } else if (typeof info['errorMessage'] === 'string') {
    line += ` (${info['errorMessage']})`;
  }
  return line;
}

function buildTextFormat(timestampFormat: 'local' | 'iso'): winston.Logform.Format {
  return winston.format.printf((info) => formatTextLine(info, timestampFormat));
}

/**
 * Console transport. Everything goes to stdout.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private format: 'text' | 'json',
    private timestampFormat: 'local' | 'iso'
  ) {}

  createWinstonTransport(): winston.transport {
    if (this.format === 'json') {
      return new winston.transports.Console({
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        stderrLevels: [],
      });
    }

    return new winston.transports.Console({
      format: buildTextFormat(this.timestampFormat),
      stderrLevels: [],
    });
  }
}

/**
 * File transport with size-based rotation.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: 'text' | 'json'
  ) {}

  createWinstonTransport(): winston.transport {
    const format =
      this.format === 'json'
        ? winston.format.combine(winston.format.timestamp(), winston.format.json())
        : buildTextFormat('local');

    return new winston.transports.File({
      filename: this.filePath,
      format,
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    });
  }
}
