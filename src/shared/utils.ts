export const newId = (): string => crypto.randomUUID().replace(/-/g, '')

export const nowIso = (): string => new Date().toISOString()

export const sleep = (ms: number) =>
  new Promise((resolve) => setTimeout(resolve, ms))

export const elapsedSince = (iso: string, now = Date.now()): number => {
  const ts = Date.parse(iso)
  if (!Number.isFinite(ts)) return 0
  return Math.max(0, now - ts)
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
