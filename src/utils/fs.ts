/** True for the error fs raises when a path does not exist. */
export const isFileNotFound = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT'
