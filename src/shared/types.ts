export type RedactedRequest = {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
};

export interface LoggerService {
  app: string;
  error(message: string, stack?: string, request?: RedactedRequest): Promise<void>;
  log(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  debug(message: string): Promise<void>;
}

export const LOGGER_SERVICE = 'LOGGER_SERVICE';

export const ACCESS_LEVELS = ['public', 'lawyer', 'judge', 'admin'] as const;
export type AccessLevel = (typeof ACCESS_LEVELS)[number];

export function isAccessLevel(value: string): value is AccessLevel {
  return ACCESS_LEVELS.some((level) => level === value);
}
