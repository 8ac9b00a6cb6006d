import axios from 'axios'

export interface UpstreamResponse {
  status: number
  data: unknown
}

/** The slice of an HTTP client the refresher needs. */
export interface UpstreamClient {
  get(url: string, options: { timeoutMs: number }): Promise<UpstreamResponse>
}

const DEFAULT_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'application/json',
  Referer: 'https://openai.com/',
}

/**
 * axios-backed client. Statuses are returned rather than thrown so the
 * refresher can report them per agent.
 */
export function createUpstreamClient(): UpstreamClient {
  const instance = axios.create({
    headers: DEFAULT_HEADERS,
    validateStatus: () => true,
  })

  return {
    async get(url, { timeoutMs }) {
      const response = await instance.get<unknown>(url, { timeout: timeoutMs })
      return { status: response.status, data: response.data }
    },
  }
}
