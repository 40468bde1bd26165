import os from 'node:os';
import path from 'node:path';

export type ConfigEnv = Partial<Record<'DAEMON_CONSOLE_CONFIG' | 'XDG_CONFIG_HOME', string>>;

export function configPath(env: ConfigEnv = process.env, home: string = os.homedir()): string {
  if (env.DAEMON_CONSOLE_CONFIG) return env.DAEMON_CONSOLE_CONFIG;
  const base = env.XDG_CONFIG_HOME || path.join(home, '.config');
  return path.join(base, 'daemon-console', 'config.yaml');
}
