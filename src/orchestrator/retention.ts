import { appendLog } from '../log/append.js'
import { bestEffort } from '../log/safe.js'

import type { TaskRecordStore } from '../storage/task-records.js'

export type RetentionSweeper = {
  sweep: () => Promise<number>
  stop: () => void
}

/** Periodically purges terminal records older than `ttlMs`. */
export const startRetentionSweeper = (params: {
  store: TaskRecordStore
  ttlMs: number
  intervalMs: number
  logPath?: string
}): RetentionSweeper => {
  let running = false
  const sweep = async (): Promise<number> => {
    if (running) return 0
    running = true
    try {
      const purged = await params.store.purgeExpired({ ttlMs: params.ttlMs })
      const { logPath } = params
      if (purged.length > 0 && logPath) {
        await bestEffort('retention: appendLog', () =>
          appendLog(logPath, {
            event: 'retention_purged',
            count: purged.length,
            taskIds: purged.slice(0, 50),
          }),
        )
      }
      return purged.length
    } finally {
      running = false
    }
  }
  const timer = setInterval(() => {
    void bestEffort('retention: sweep', sweep, {
      ...(params.logPath ? { logPath: params.logPath } : {}),
    })
  }, params.intervalMs)
  timer.unref()
  return {
    sweep,
    stop: () => clearInterval(timer),
  }
}
