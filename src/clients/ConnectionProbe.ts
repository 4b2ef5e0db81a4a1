import { Socket } from 'net';
import { Client } from 'pg';
import { BackupTarget } from '../interfaces/BackupConfig';
import { ConnectionProbe as IConnectionProbe, ProbeResult } from '../interfaces/ConnectionProbe';
import { Logger } from '../interfaces/Logger';
import { formatError } from '../errors/BackupError';

export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

/**
 * Checks that a target's server accepts connections before any dump is
 * attempted. PostgreSQL targets are queried with the target credentials,
 * MySQL targets get a TCP connect to the server port.
 */
export class ConnectionProbe implements IConnectionProbe {
  constructor(
    private logger: Logger,
    private timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS
  ) {}

  async probe(target: BackupTarget): Promise<ProbeResult> {
    const startTime = Date.now();

    try {
      if (target.engine === 'postgres') {
        await this.probePostgres(target);
      } else {
        await this.probeTcp(target.host, target.port);
      }

      const latencyMs = Date.now() - startTime;
      this.logger.info(`Target ${target.id} is reachable`, { targetId: target.id, latencyMs });
      return { targetId: target.id, reachable: true, latencyMs };
    } catch (error) {
      const latencyMs = Date.now() - startTime;
      const message = formatError(error);
      this.logger.warn(`Target ${target.id} is not reachable: ${message}`, {
        targetId: target.id,
        host: target.host,
        port: target.port,
      });
      return { targetId: target.id, reachable: false, latencyMs, error: message };
    }
  }

  private async probePostgres(target: BackupTarget): Promise<void> {
    const client = new Client({
      host: target.host,
      port: target.port,
      user: target.user,
      password: target.password,
      // pg_dumpall connects to the maintenance database first
      database: target.allDatabases ? 'postgres' : target.database,
      connectionTimeoutMillis: this.timeoutMs,
    });

    await client.connect();
    try {
      await client.query('SELECT 1');
    } finally {
      await client.end();
    }
  }

  private probeTcp(host: string, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new Socket();

      const fail = (error: Error): void => {
        socket.destroy();
        reject(error);
      };

      socket.setTimeout(this.timeoutMs);
      socket.once('timeout', () => fail(new Error(`Connection to ${host}:${port} timed out`)));
      socket.once('error', fail);
      socket.connect(port, host, () => {
        socket.end();
        resolve();
      });
    });
  }
}
