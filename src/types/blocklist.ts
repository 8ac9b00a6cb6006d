/** Top-level key of the persisted dataset and source files. */
export const PROVIDER_KEY = 'openai'

export const KNOWN_AGENTS = ['searchbot', 'chatgpt-user', 'gptbot'] as const

export type AgentName = (typeof KNOWN_AGENTS)[number]

/** CIDR ranges per crawling agent. */
export type Dataset = Record<AgentName, string[]>

export interface RefreshSource {
  agent: AgentName
  url: string
}

export const isAgentName = (value: string): value is AgentName =>
  KNOWN_AGENTS.some((agent) => agent === value)

export const emptyDataset = (): Dataset => ({
  searchbot: [],
  'chatgpt-user': [],
  gptbot: [],
})

export const cloneDataset = (dataset: Dataset): Dataset => ({
  searchbot: [...dataset.searchbot],
  'chatgpt-user': [...dataset['chatgpt-user']],
  gptbot: [...dataset.gptbot],
})
