import type { Logger } from '../logging/logger.js';
import type { CommandRunner } from '../process/CommandRunner.js';

/**
 * One row of the local ARP/neighbor table. `arp -a` gives both fields;
 * `ip neigh` only the address.
 */
export type NeighborEntry = {
  name?: string;
  address?: string;
};

export interface NeighborTableSource {
  /** Rows in table order. Never rejects; an unreadable table is empty. */
  read(): Promise<NeighborEntry[]>;
}

// "f21566.local (169.254.195.131) at 0:1a:2b:3c:4d:5e on en7 [ethernet]"
// "? (169.254.10.2) at (incomplete) on en5"
const ARP_LINE = /^(?<name>\S+)\s+\((?<address>[^)\s]+)\)/;
const IPV4 = /^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}$/;

export function parseArpOutput(output: string): NeighborEntry[] {
  const entries: NeighborEntry[] = [];
  for (const line of output.split(/\r?\n/)) {
    const match = ARP_LINE.exec(line.trim());
    if (!match?.groups) continue;
    const name = match.groups['name'];
    const address = match.groups['address'];
    entries.push({
      ...(name && name !== '?' ? { name } : {}),
      ...(address ? { address } : {}),
    });
  }
  return entries;
}

// "169.254.10.2 dev usb0 lladdr 02:00:00:00:00:01 REACHABLE"
export function parseIpNeighOutput(output: string): NeighborEntry[] {
  const entries: NeighborEntry[] = [];
  for (const line of output.split(/\r?\n/)) {
    const address = line.trim().split(/\s+/)[0];
    if (address && IPV4.test(address)) {
      entries.push({ address });
    }
  }
  return entries;
}

export type SystemNeighborTableOptions = {
  runner: CommandRunner;
  timeoutMs: number;
  logger: Logger;
};

/**
 * Reads the neighbor table with `arp -a`, falling back to `ip -4 neigh show`
 * on hosts without net-tools.
 */
export class SystemNeighborTable implements NeighborTableSource {
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: SystemNeighborTableOptions) {
    this.runner = options.runner;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  async read(): Promise<NeighborEntry[]> {
    const arp = await this.runner.run({ command: 'arp', args: ['-a'], timeoutMs: this.timeoutMs });
    if (arp.ok) {
      return parseArpOutput(arp.stdout);
    }
    this.logger.debug(
      { exitCode: arp.exitCode, timedOut: arp.timedOut, stderr: arp.stderr },
      'arp -a unavailable, trying ip neigh',
    );

    const neigh = await this.runner.run({ command: 'ip', args: ['-4', 'neigh', 'show'], timeoutMs: this.timeoutMs });
    if (neigh.ok) {
      return parseIpNeighOutput(neigh.stdout);
    }
    this.logger.debug(
      { exitCode: neigh.exitCode, timedOut: neigh.timedOut, stderr: neigh.stderr },
      'Neighbor table unavailable',
    );
    return [];
  }
}
