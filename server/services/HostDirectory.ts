import { readFile } from 'fs/promises'
import { execFile } from 'child_process'
import { isIP } from 'net'
import type { HostLookup } from './SnapshotParser'

/** Well-known ports and how clients should describe them */
const WELL_KNOWN_PORTS: ReadonlyMap<string, string> = new Map([
  ['22', 'SSH'],
  ['80', 'HTTP'],
  ['143', 'IMAP'],
  ['443', 'HTTPS'],
  ['16393', 'FaceTime'],
  ['25565', 'Minecraft']
])

/** Timeout for the DHCP lease listing command (ms) */
const LEASE_COMMAND_TIMEOUT = 5_000

/** Parse an ethers-style file: `<mac> <name>` per line, `#` comments */
export function parseEthers(content: string): Map<string, string> {
  const ethers = new Map<string, string>()
  for (const raw of content.split('\n')) {
    const line = raw.replace(/#.*/, '').trim()
    if (!line) continue
    const [mac, name] = line.split(/\s+/)
    if (mac && name) ethers.set(mac.toLowerCase(), name)
  }
  return ethers
}

/**
 * Parse DHCP lease listing output: `<mac> <ip> <name> ...` per row.
 * Rows whose second column is not an IP address (headers, separators) are skipped.
 * A MAC found in `ethers` takes the ethers name over the lease hostname.
 */
export function parseLeases(output: string, ethers: ReadonlyMap<string, string>): Map<string, string> {
  const hosts = new Map<string, string>()
  for (const line of output.split('\n')) {
    const parts = line.trim().split(/\s+/)
    if (parts.length < 3) continue
    const [mac, ip, name] = parts
    if (isIP(ip) === 0) continue
    hosts.set(ip, ethers.get(mac.toLowerCase()) ?? name)
  }
  return hosts
}

function runLeaseCommand(command: string): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(command, [], { timeout: LEASE_COMMAND_TIMEOUT }, (err, stdout) => {
      if (err) return reject(err)
      resolve(stdout)
    })
  })
}

export interface HostDirectoryOptions {
  ethersFile?: string
  leaseCommand?: string
}

/**
 * Maps local IP addresses to friendly names and ports to service names.
 * Names come from an ethers file and the DHCP lease table; either may be absent.
 */
export class HostDirectory implements HostLookup {
  private hosts = new Map<string, string>()

  constructor(entries?: Iterable<[string, string]>) {
    if (entries) this.hosts = new Map(entries)
  }

  /**
   * Load names from the configured sources.
   * Missing files or commands leave the directory empty; returns warnings for the caller to log.
   */
  async load(options: HostDirectoryOptions): Promise<string[]> {
    const warnings: string[] = []
    let ethers = new Map<string, string>()

    if (options.ethersFile) {
      try {
        ethers = parseEthers(await readFile(options.ethersFile, 'utf-8'))
      } catch (err: unknown) {
        if (!isMissing(err)) {
          warnings.push(`Cannot read ${options.ethersFile}: ${describe(err)}`)
        }
      }
    }

    if (options.leaseCommand) {
      try {
        this.hosts = parseLeases(await runLeaseCommand(options.leaseCommand), ethers)
      } catch (err: unknown) {
        if (!isMissing(err)) {
          warnings.push(`Lease command ${options.leaseCommand} failed: ${describe(err)}`)
        }
      }
    }

    return warnings
  }

  get size(): number {
    return this.hosts.size
  }

  labelFor(host: string): string | undefined {
    return this.hosts.get(host)
  }

  /** When both ports are well known, the later table entry wins */
  serviceFor(ports: string[]): string | undefined {
    let service: string | undefined
    for (const [port, name] of WELL_KNOWN_PORTS) {
      if (ports.includes(port)) service = name
    }
    return service
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
