import fs from 'fs';
import { errorMessage } from './errors';

const DEFAULT_ERROR_LOG = 'crisis_check_errors.log';

// Query-string credentials (key=..., apiKey=...) and bearer tokens
const SECRET_PATTERNS: RegExp[] = [
  /([?&](?:key|apikey|api_key|apiKey)=)[^&\s"]+/gi,
  /(Bearer\s+)[A-Za-z0-9._~+/-]+=*/g,
];

export function redact(text: string): string {
  return SECRET_PATTERNS.reduce((out, pattern) => out.replace(pattern, '$1[redacted]'), text);
}

function serialize(data: unknown): unknown {
  if (data instanceof Error) {
    return {
      name: data.name,
      message: redact(data.message),
      cause: data.cause === undefined ? undefined : serialize(data.cause),
    };
  }
  if (data && typeof data === 'object' && !Array.isArray(data)) {
    return Object.fromEntries(Object.entries(data).map(([key, value]) => [key, serialize(value)]));
  }
  return typeof data === 'string' ? redact(data) : data;
}

export function logInfo(tag: string, message: string): void {
  console.log(`[${tag}] ${redact(message)}`);
}

export function logWarn(tag: string, message: string, err?: unknown): void {
  if (err === undefined) {
    console.warn(`[${tag}] ${redact(message)}`);
  } else {
    console.warn(`[${tag}] ${redact(message)}: ${redact(errorMessage(err))}`);
  }
}

/**
 * Writes to stderr and appends a timestamped record to the error log file.
 * Set ERROR_LOG_FILE to an empty string to keep records off disk.
 */
export function logError(message: string, data: unknown): void {
  const payload = serialize(data);
  console.error(`[Error] ${redact(message)}`, payload);

  const file = process.env.ERROR_LOG_FILE ?? DEFAULT_ERROR_LOG;
  if (!file) {
    return;
  }
  const line = `[${new Date().toISOString()}] ${redact(message)}: ${JSON.stringify(payload, null, 2)}\n`;
  try {
    fs.appendFileSync(file, line);
  } catch (err) {
    console.error(`[Error] Could not append to ${file}: ${errorMessage(err)}`);
  }
}
