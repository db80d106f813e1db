import * as path from 'path';
import { LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * Read a file path setting. Relative values resolve against the working
 * directory; an empty value yields '' (setting disabled).
 */
export function configuredPath(
  configService: ConfigService,
  key: string,
  defaultPath: string,
): string {
  const value = configService.get<string>(key);
  if (value === undefined) return defaultPath;
  return value.trim() === '' ? '' : path.resolve(value.trim());
}

export function configuredInt(
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number {
  const value = Number(configService.get<string | number>(key, defaultValue));
  return Number.isInteger(value) && value > 0 ? value : defaultValue;
}

const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Nest logger levels enabled by a LOG_LEVEL value, most severe first.
 * Unknown or missing values mean `warn`.
 */
export function logLevelsFor(level: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex(
    (candidate) => candidate === level?.trim().toLowerCase(),
  );
  return LOG_LEVELS.slice(0, index === -1 ? 3 : index + 1);
}
