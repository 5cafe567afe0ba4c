import { SamplerProcess, buildSamplerArgs, nodeSamplerHost, type SamplerHost } from './SamplerProcess'
import { SnapshotParser, type HostLookup } from './SnapshotParser'
import type { InterfaceStateStore } from './InterfaceStateStore'
import { LogService } from './LogService'
import type { RestartPolicy } from './RestartBackoff'
import type { SamplerStatus } from '../../src/types/traffic'

export interface TrafficMonitorOptions {
  samplerCommand: string
  samplerArgs: string[]
  displayLimit: number
  requirePrivilege: boolean
  requireInterfacePresent: boolean
  stopTimeoutMs: number
  restart: RestartPolicy
  hosts?: HostLookup
  samplerHost?: SamplerHost
  now?: () => number
}

/** Per-interface pipeline: sampler → parser → store */
interface Pipeline {
  sampler: SamplerProcess
  parser: SnapshotParser
  samples: number
  discarded: number
}

export interface PipelineStats {
  interfaceId: string
  status: SamplerStatus
  pid?: number
  consecutiveFailures: number
  nextRestartAt: number | null
  samples: number
  discarded: number
}

/**
 * Runs one sampler per configured interface and feeds the store.
 *
 * Interfaces are fully independent: a missing privilege, a crash loop or bad
 * output on one never touches another. Lines of one interface are parsed and
 * applied in the order the sampler printed them.
 */
export class TrafficMonitor {
  private pipelines = new Map<string, Pipeline>()
  private started = false

  constructor(
    private readonly store: InterfaceStateStore,
    private readonly options: TrafficMonitorOptions,
    private readonly log: LogService
  ) {
    for (const config of store.interfaces) {
      this.pipelines.set(config.id, this.createPipeline(config.id))
    }
  }

  /** Launch every sampler. Interfaces that fail preflight are marked misconfigured. */
  start(): void {
    if (this.started) return
    this.started = true
    for (const pipeline of this.pipelines.values()) {
      pipeline.sampler.start()
    }
  }

  /** Stop every sampler and wait for the children to exit */
  async stop(): Promise<void> {
    this.started = false
    await Promise.all(Array.from(this.pipelines.values(), (p) => p.sampler.stop()))
  }

  /**
   * Apply one line of sampler output for an interface.
   * Lines for interfaces that are not configured are ignored.
   */
  ingest(interfaceId: string, line: string): void {
    const pipeline = this.pipelines.get(interfaceId)
    if (!pipeline) return

    const outcome = pipeline.parser.push(line)
    if (!outcome) return

    if (outcome.type === 'discarded') {
      pipeline.discarded++
      LogService.blockDiscarded(this.log, interfaceId, outcome.reason)
      return
    }

    pipeline.samples++
    if (outcome.droppedConnections > 0) {
      this.log.log(interfaceId, 'debug', 'parser', `${outcome.droppedConnections} connection line(s) with unreadable rates skipped`)
    }
    pipeline.sampler.markHealthy()
    this.store.update(outcome.sample)
  }

  /** Per-interface sampler counters, in configuration order */
  stats(): PipelineStats[] {
    return Array.from(this.pipelines.entries(), ([interfaceId, p]) => ({
      interfaceId,
      status: p.sampler.status,
      pid: p.sampler.pid,
      consecutiveFailures: p.sampler.consecutiveFailures,
      nextRestartAt: p.sampler.nextRestartAt,
      samples: p.samples,
      discarded: p.discarded
    }))
  }

  private createPipeline(interfaceId: string): Pipeline {
    const opts = this.options
    const sampler = new SamplerProcess(
      interfaceId,
      {
        command: opts.samplerCommand,
        args: buildSamplerArgs(interfaceId, opts.displayLimit, opts.samplerArgs),
        requirePrivilege: opts.requirePrivilege,
        requireInterfacePresent: opts.requireInterfacePresent,
        stopTimeoutMs: opts.stopTimeoutMs,
        restart: opts.restart
      },
      this.log,
      opts.samplerHost ?? nodeSamplerHost
    )
    const parser = new SnapshotParser(interfaceId, {
      displayLimit: opts.displayLimit,
      hosts: opts.hosts,
      now: opts.now
    })
    const pipeline: Pipeline = { sampler, parser, samples: 0, discarded: 0 }

    sampler.on('line', (line: string) => this.ingest(interfaceId, line))
    sampler.on('reset', () => parser.reset())
    sampler.on('status', (status: SamplerStatus, failures: number, error?: string) => {
      this.store.setStatus(interfaceId, status, failures, error)
    })

    return pipeline
  }
}
