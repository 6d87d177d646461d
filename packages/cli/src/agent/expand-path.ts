import * as os from 'node:os';
import * as path from 'node:path';

type Env = Record<string, string | undefined>;

const VARIABLE = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

/**
 * Expand `$VAR` / `${VAR}` and a leading `~` in a requested path.
 * Unknown variables are left as written.
 */
export function expandPath(requested: string, env: Env = process.env, home: string = os.homedir()): string {
  const expanded = requested.replace(VARIABLE, (match: string, braced?: string, bare?: string) => {
    const name = braced ?? bare ?? '';
    return env[name] ?? match;
  });

  if (expanded === '~') {
    return home;
  }
  if (expanded.startsWith('~/') || expanded.startsWith(`~${path.sep}`)) {
    return path.join(home, expanded.slice(2));
  }
  return expanded;
}
