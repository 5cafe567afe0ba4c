import type { RestartPolicy } from '../RestartBackoff'

export const RULE = '-'.repeat(92)
export const END = '='.repeat(92)

/** One complete text-mode block with three connections */
export function sampleBlock(overrides: { thirdSendRate?: string } = {}): string[] {
  const third = overrides.thirdSendRate ?? '1Kb'
  return [
    'Listening on eth0',
    '   # Host name (port/service if enabled)            last 2s   last 10s   last 40s cumulative',
    RULE,
    '   1 192.168.1.5:22                           =>      1.5Kb      1.5Kb      1.5Kb       390B',
    '     10.0.0.9:51000                           <=       500b       500b       500b       125B',
    '   2 192.168.1.5:443                          =>        4Kb        2Kb        1Kb        2KB',
    '     10.0.0.7:52000                           <=        1Kb        1Kb        1Kb        1KB',
    `   3 192.168.1.5:8080                         =>  ${third.padStart(9)}        1Kb        1Kb        1KB`,
    '     10.0.0.3:40000                           <=        1Kb        1Kb        1Kb        1KB',
    RULE,
    'Total send rate:                                      6.5Kb      4.5Kb      3.5Kb',
    'Total receive rate:                                   2.5Kb      2.5Kb      2.5Kb',
    'Total send and receive rate:                            9Kb        7Kb        6Kb',
    RULE,
    'Peak rate (sent/received/total):                        7Kb        3Kb       10Kb',
    'Cumulative (sent/received/total):                       3KB      1.5KB      4.5KB',
    END
  ]
}

/** A block with only totals and no connections */
export function quietBlock(): string[] {
  return [
    RULE,
    'Total send rate:                                        0b         0b         0b',
    'Total receive rate:                                     0b         0b         0b',
    'Total send and receive rate:                            0b         0b         0b',
    END
  ]
}

export const TEST_POLICY: RestartPolicy = {
  initialDelay: 1,
  maxDelay: 30,
  backoffMultiplier: 2,
  maxConsecutiveFailures: 3,
  jitter: false
}
