import type { Executor } from '../executor';

export interface ObservedUnit {
  name: string;
  runState: string; // systemd ACTIVE column, verbatim
  description: string;
}

export const LIST_UNITS_ARGS = ['list-units', '--type=service', '--all', '--no-pager', '--plain', '--no-legend'] as const;

/**
 * Parses `systemctl list-units --plain` output:
 *
 *   nginx.service  loaded active running  A high performance web server
 *
 * Columns are UNIT LOAD ACTIVE SUB DESCRIPTION. Lines with fewer than four
 * columns, the heading row and non-service units are dropped.
 */
export function parseUnitList(output: string): ObservedUnit[] {
  const units: ObservedUnit[] = [];

  for (const line of output.split('\n')) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 4) continue;

    const [name, , runState, , ...description] = parts;
    if (name === 'UNIT' || !name.endsWith('.service')) continue;

    units.push({ name, runState, description: description.join(' ') });
  }

  return units;
}

export async function listUnits(executor: Executor): Promise<ObservedUnit[]> {
  const { stdout } = await executor.exec('systemctl', LIST_UNITS_ARGS);
  return parseUnitList(stdout);
}

/** `MainPID=0` is what systemd reports for a unit with no running process. */
export function parseMainPid(output: string): number | undefined {
  const match = output.match(/^MainPID=(\d+)\s*$/m);
  if (!match) return undefined;

  const pid = Number(match[1]);
  return pid > 0 ? pid : undefined;
}

export async function resolvePid(executor: Executor, unitName: string): Promise<number | undefined> {
  const { stdout } = await executor.exec('systemctl', ['show', '--property=MainPID', '--', unitName]);
  return parseMainPid(stdout);
}
