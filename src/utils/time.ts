/** UTC calendar date of `date` as YYYY-MM-DD. */
export const utcDateKey = (date: Date): string => date.toISOString().slice(0, 10)

/** First instant of the UTC day after `date`. */
export const nextUtcMidnight = (date: Date): Date =>
  new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate() + 1))

export const secondsUntil = (from: Date, to: Date): number =>
  Math.max(0, Math.ceil((to.getTime() - from.getTime()) / 1000))

export const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms)
  })
