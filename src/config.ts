import { z } from 'zod';

export type EnvSource = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const configSchema = z.object({
  MEMFS_LOG_LEVEL: z.enum(LOG_LEVELS).default('silent'),
  MEMFS_UMASK: z
    .string()
    .regex(/^0?[0-7]{1,3}$/, 'expected an octal permission mask such as 022')
    .default('022')
    .transform((value) => parseInt(value, 8)),
});

export interface MemFSConfig {
  logLevel: LogLevel;
  umask: number;
}

function formatIssues(issues: z.ZodIssue[]): string {
  const details = issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `  • ${location}: ${issue.message}`;
  });
  return `Invalid memtree-fs configuration\n${details.join('\n')}`;
}

export function loadConfig(env: EnvSource = process.env): MemFSConfig {
  const result = configSchema.safeParse({ ...env });
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error.issues));
  }
  return {
    logLevel: result.data.MEMFS_LOG_LEVEL,
    umask: result.data.MEMFS_UMASK,
  };
}
