import type { Executor } from '../executor';

export interface PortBinding {
  port: number;
  ownerPid: number;
}

export type PortIndex = ReadonlyMap<number, readonly PortBinding[]>;

// -t TCP, -l listening, -n numeric, -p owning process, -H no header
export const LIST_SOCKETS_ARGS = ['-tlnpH'] as const;

const WEB_PORTS: ReadonlySet<number> = new Set([80, 443]);
const WEB_PORT_RANGES: ReadonlyArray<readonly [number, number]> = [
  [3000, 3999],
  [4000, 4999],
  [5000, 5999],
  [8000, 8999],
];

// Local address column: 0.0.0.0:80, *:80, [::]:443, 127.0.0.53%lo:53
const LOCAL_ADDRESS = /(?:^|\s)\S+:(\d+)(?=\s|$)/;
const OWNER_PID = /\bpid=(\d+)/g;

/**
 * Parses `ss -tlnp` rows into one binding per (port, pid). A socket shared by
 * several processes (a pre-forking server) yields one binding per process,
 * in the order ss lists them. Rows without both a port and a pid are skipped.
 */
export function parseListeningSockets(output: string): PortBinding[] {
  const bindings: PortBinding[] = [];

  for (const line of output.split('\n')) {
    const portMatch = line.match(LOCAL_ADDRESS);
    if (!portMatch) continue;

    const port = Number(portMatch[1]);
    if (port < 1 || port > 65535) continue;

    const pids = new Set<number>();
    for (const pidMatch of line.matchAll(OWNER_PID)) {
      pids.add(Number(pidMatch[1]));
    }
    for (const ownerPid of pids) {
      bindings.push({ port, ownerPid });
    }
  }

  return bindings;
}

export async function listListeningPorts(executor: Executor): Promise<PortBinding[]> {
  const { stdout } = await executor.exec('ss', LIST_SOCKETS_ARGS);
  return parseListeningSockets(stdout);
}

/** Heuristic for "probably serves HTTP". */
export function isWebPort(port: number): boolean {
  if (!Number.isInteger(port)) return false;
  if (WEB_PORTS.has(port)) return true;
  return WEB_PORT_RANGES.some(([start, end]) => port >= start && port <= end);
}

export function portsForPid(bindings: readonly PortBinding[], pid: number): PortBinding[] {
  return bindings.filter(b => b.ownerPid === pid);
}

/** Groups bindings by owning PID, keeping listing order within each group. */
export function indexByPid(bindings: readonly PortBinding[]): PortIndex {
  const index = new Map<number, PortBinding[]>();
  for (const binding of bindings) {
    const group = index.get(binding.ownerPid);
    if (group) {
      group.push(binding);
    } else {
      index.set(binding.ownerPid, [binding]);
    }
  }
  return index;
}
