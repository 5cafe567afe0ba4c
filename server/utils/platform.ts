import { networkInterfaces } from 'os'

/**
 * Whether this process can open raw sockets.
 * Approximated by an effective uid of 0; capability-granted binaries need `requirePrivilege: false`.
 */
export function isPrivileged(): boolean {
  return typeof process.geteuid === 'function' && process.geteuid() === 0
}

/** Check whether the host has a network interface with this name */
export function hasNetworkInterface(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(networkInterfaces(), name)
}
