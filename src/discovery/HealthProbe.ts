import { ROBOT_VERSION_HEADER, endpointUrl, type FetchLike } from '../robot/types.js';

export type HealthProbeOptions = {
  port: number;
  apiVersion: string;
  timeoutMs: number;
  fetchFn?: FetchLike;
};

export type ProbeResult = {
  host: string;
  live: boolean;
  /** HTTP status of a completed probe */
  httpStatus?: number;
  /** Transport error of a failed probe */
  error?: string;
};

export interface HostProbe {
  /** Live when `GET /health` on the host completes without a transport error. */
  probe(host: string): Promise<ProbeResult>;
}

/**
 * Liveness check against robot-server's health route. Only reachability
 * matters: a completed request with any HTTP status counts as live.
 */
export class HealthProbe implements HostProbe {
  private readonly port: number;
  private readonly apiVersion: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;

  constructor(options: HealthProbeOptions) {
    this.port = options.port;
    this.apiVersion = options.apiVersion;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async probe(host: string): Promise<ProbeResult> {
    try {
      const resp = await this.fetchFn(endpointUrl({ host, port: this.port }, '/health'), {
        method: 'GET',
        headers: { [ROBOT_VERSION_HEADER]: this.apiVersion },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      await resp.text();
      return { host, live: true, httpStatus: resp.status };
    } catch (err) {
      return { host, live: false, error: err instanceof Error ? err.message : String(err) };
    }
  }
}
