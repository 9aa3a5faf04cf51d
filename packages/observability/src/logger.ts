export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
}

export function serializeError(error: Error): SerializedError {
  const serialized: SerializedError = { name: error.name, message: error.message };
  if ('code' in error && typeof error.code === 'string') {
    serialized.code = error.code;
  }
  return serialized;
}

// Error instances carry no enumerable fields and would log as {}
function toLoggable(metadata: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    result[key] = value instanceof Error ? serializeError(value) : value;
  }
  return result;
}

export function log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    metadata: metadata ? toLoggable(metadata) : {}
  });

  if (level === 'error') {
    console.error(line);
    return;
  }

  console.log(line);
}
