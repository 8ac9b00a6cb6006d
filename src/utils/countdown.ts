/**
 * Formats a wait time for quota messages.
 *
 * One hour or more reads "H hours, M minutes", one minute or more reads
 * "M minutes, S seconds", anything shorter reads "S seconds".
 */
export function formatResetCountdown(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds))
  const hours = Math.floor(seconds / 3600)
  const minutes = Math.floor((seconds % 3600) / 60)
  const remainder = seconds % 60

  if (hours > 0) {
    return `${hours} hours, ${minutes} minutes`
  }
  if (minutes > 0) {
    return `${minutes} minutes, ${remainder} seconds`
  }
  return `${remainder} seconds`
}
