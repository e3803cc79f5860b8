import { isWebPort, type PortIndex } from '../network/ports';

export type Classification =
  | { stage: 'raw' }
  | { stage: 'discovered'; port: number };

/**
 * Decides the first lifecycle stage of a unit seen for the first time.
 * A unit is `discovered` when its main process listens on a web-like port;
 * with several, the first one in socket listing order wins.
 */
export function classifyUnit(pid: number | undefined, portIndex: PortIndex): Classification {
  if (pid === undefined) return { stage: 'raw' };

  const webBinding = (portIndex.get(pid) ?? []).find(b => isWebPort(b.port));
  return webBinding ? { stage: 'discovered', port: webBinding.port } : { stage: 'raw' };
}
