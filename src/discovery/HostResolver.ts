import type { DiscoveryConfig } from '../config/types.js';
import { UnreachableError } from '../execution/errors.js';
import type { Logger } from '../logging/logger.js';
import type { Endpoint } from '../robot/types.js';
import type { HostProbe, ProbeResult } from './HealthProbe.js';
import type { NeighborEntry, NeighborTableSource } from './NeighborTable.js';

const IPV4 = /^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}$/;

export type HostResolverOptions = {
  port: number;
  discovery: Pick<DiscoveryConfig, 'wellKnownHost' | 'linkLocalDomainSuffix' | 'linkLocalSubnetPrefix'>;
  neighborTable: NeighborTableSource;
  probe: HostProbe;
  logger: Logger;
};

export type DiscoveryReport = {
  candidates: string[];
  live: string[];
};

function dedupeKeepOrder(items: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of items) {
    if (item.length === 0 || seen.has(item)) continue;
    seen.add(item);
    out.push(item);
  }
  return out;
}

/**
 * Ordered discovery candidates: the well-known name first, then for each
 * neighbor-table row its link-local name and its link-local address.
 */
export function buildCandidates(
  entries: readonly NeighborEntry[],
  discovery: HostResolverOptions['discovery'],
): string[] {
  const candidates: string[] = [discovery.wellKnownHost];
  for (const entry of entries) {
    const name = entry.name?.trim();
    if (name && name.endsWith(discovery.linkLocalDomainSuffix)) {
      candidates.push(name);
    }
    const address = entry.address?.trim();
    if (address && IPV4.test(address) && address.startsWith(discovery.linkLocalSubnetPrefix)) {
      candidates.push(address);
    }
  }
  return dedupeKeepOrder(candidates);
}

/**
 * Finds the robot-server to talk to.
 *
 * With a hint only that host is probed. Otherwise every candidate is probed in
 * priority order and the highest-priority live one wins, no matter which
 * answered first.
 */
export class HostResolver {
  private readonly port: number;
  private readonly discovery: HostResolverOptions['discovery'];
  private readonly neighborTable: NeighborTableSource;
  private readonly probe: HostProbe;
  private readonly logger: Logger;

  constructor(options: HostResolverOptions) {
    this.port = options.port;
    this.discovery = options.discovery;
    this.neighborTable = options.neighborTable;
    this.probe = options.probe;
    this.logger = options.logger;
  }

  async resolve(hint?: string): Promise<Endpoint> {
    const explicit = hint?.trim();
    if (explicit) {
      this.logger.info({ host: explicit }, `Using host from args/env: ${explicit}`);
      const result = await this.probeLogged(explicit);
      if (!result.live) {
        throw new UnreachableError(`Unable to reach robot at ${explicit}:${this.port}`, [explicit]);
      }
      return { host: explicit, port: this.port };
    }

    const report = await this.discover();
    const [chosen] = report.live;
    if (chosen === undefined) {
      throw new UnreachableError(
        'No reachable OT-2 robot found. Connect via USB and/or pass --host HOST.',
        report.candidates,
      );
    }

    if (report.live.length > 1) {
      this.logger.warn({ hosts: report.live }, `Multiple reachable hosts found: ${report.live.join(' ')}`);
      this.logger.warn({ host: chosen }, `Using first host: ${chosen} (pass --host to choose explicitly).`);
    } else {
      this.logger.info({ host: chosen }, `Auto-discovered OT-2 host: ${chosen}`);
    }
    return { host: chosen, port: this.port };
  }

  /** Probes every candidate, in order, and reports which ones answered. */
  async discover(): Promise<DiscoveryReport> {
    const entries = await this.neighborTable.read();
    const candidates = buildCandidates(entries, this.discovery);
    this.logger.debug({ candidates }, 'Discovery candidates');

    const live: string[] = [];
    for (const candidate of candidates) {
      const result = await this.probeLogged(candidate);
      if (result.live) {
        live.push(candidate);
      }
    }
    return { candidates, live };
  }

  private async probeLogged(host: string): Promise<ProbeResult> {
    const result = await this.probe.probe(host);
    if (result.live) {
      this.logger.debug({ host, httpStatus: result.httpStatus }, 'Health probe answered');
    } else {
      this.logger.debug({ host, error: result.error }, 'Health probe failed');
    }
    return result;
  }
}
