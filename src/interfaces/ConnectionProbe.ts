import { BackupTarget } from './BackupConfig';

export interface ProbeResult {
  targetId: string;
  reachable: boolean;
  latencyMs: number;
  error?: string;
}

/**
 * Startup reachability check for a target's database server
 */
export interface ConnectionProbe {
  probe(target: BackupTarget): Promise<ProbeResult>;
}
