import { LogLevel } from '@nestjs/common';
import * as path from 'path';
import { z } from 'zod';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

export const environmentSchema = z.object({
  COUNTRIES_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['error', 'warn', 'log', 'debug', 'verbose']).default('warn'),
});

export interface AppConfig {
  countriesPath: string;
  logLevels: LogLevel[];
}

/** Every level up to and including the given one, most severe first. */
export const logLevelsUpTo = (level: LogLevel): LogLevel[] =>
  LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);

export default (): AppConfig => {
  const env = environmentSchema.parse(process.env);
  return {
    countriesPath: path.resolve(process.cwd(), env.COUNTRIES_PATH ?? 'data/countries.json'),
    logLevels: logLevelsUpTo(env.LOG_LEVEL),
  };
};
