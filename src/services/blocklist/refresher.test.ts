import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { promises as fs } from 'fs'
import os from 'os'
import path from 'path'
import { PersistenceUnavailableError } from '../../errors.js'
import type { RefreshSource } from '../../types/blocklist.js'
import { AddressRangeStore, serializeDataset } from './addressRangeStore.js'
import { DatasetRefresher } from './refresher.js'
import type { UpstreamClient, UpstreamResponse } from './upstream.js'

const SOURCES: RefreshSource[] = [
  { agent: 'searchbot', url: 'https://example.test/searchbot.json' },
  { agent: 'chatgpt-user', url: 'https://example.test/chatgpt-user.json' },
  { agent: 'gptbot', url: 'https://example.test/gptbot.json' },
]

const INITIAL = {
  searchbot: ['192.0.2.0/24'],
  'chatgpt-user': ['192.0.2.64/26'],
  gptbot: ['198.51.100.0/24'],
}

const prefixes = (...ranges: string[]): UpstreamResponse => ({
  status: 200,
  data: { creationTime: '2026-05-01T00:00:00Z', prefixes: ranges.map((ipv4Prefix) => ({ ipv4Prefix })) },
})

const stubClient = (responses: Record<string, UpstreamResponse | Error>) => {
  const get = vi.fn(async (url: string): Promise<UpstreamResponse> => {
    const response = responses[url]
    if (response instanceof Error) {
      throw response
    }
    if (!response) {
      throw new Error(`unexpected url ${url}`)
    }
    return response
  })
  const client: UpstreamClient = { get }
  return { client, get }
}

const makeSleep = () => vi.fn(async (_ms: number) => {})

describe('DatasetRefresher', () => {
  let dir: string
  let file: string
  let store: AddressRangeStore
  let sleep: ReturnType<typeof makeSleep>

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})

    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'refresh-'))
    file = path.join(dir, 'block_ips.json')
    // Compact on purpose: a rewrite would change the bytes.
    await fs.writeFile(file, JSON.stringify({ openai: INITIAL }))
    store = new AddressRangeStore(file)
    await store.load()
    sleep = makeSleep()
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('merges the agents that succeed and reports the one that fails', async () => {
    const { client } = stubClient({
      'https://example.test/searchbot.json': prefixes('10.0.0.0/24', '10.0.1.0/24'),
      'https://example.test/chatgpt-user.json': { status: 500, data: 'upstream error' },
      'https://example.test/gptbot.json': prefixes('10.1.0.0/16'),
    })
    const refresher = new DatasetRefresher(store, SOURCES, client, { sleep })

    const outcome = await refresher.refresh()

    const merged = {
      searchbot: ['10.0.0.0/24', '10.0.1.0/24'],
      'chatgpt-user': ['192.0.2.64/26'],
      gptbot: ['10.1.0.0/16'],
    }
    expect(outcome).toEqual({
      ok: true,
      merged,
      warnings: ['HTTP error occurred for chatgpt-user: status 500'],
      updatedAgents: ['searchbot', 'gptbot'],
      changed: true,
    })
    expect(store.getAll()).toEqual(merged)
    expect(await fs.readFile(file, 'utf-8')).toBe(serializeDataset(merged))
  })

  it('leaves storage byte-for-byte untouched when every agent fails', async () => {
    const before = await fs.readFile(file)
    const { client } = stubClient({
      'https://example.test/searchbot.json': new Error('getaddrinfo ENOTFOUND example.test'),
      'https://example.test/chatgpt-user.json': { status: 403, data: 'forbidden' },
      'https://example.test/gptbot.json': new Error('timeout of 10000ms exceeded'),
    })
    const refresher = new DatasetRefresher(store, SOURCES, client, { sleep })

    const outcome = await refresher.refresh()

    expect(outcome).toEqual({
      ok: false,
      warnings: [
        'Request failed for searchbot: getaddrinfo ENOTFOUND example.test',
        'HTTP error occurred for chatgpt-user: status 403',
        'Request failed for gptbot: timeout of 10000ms exceeded',
      ],
    })
    expect((await fs.readFile(file)).equals(before)).toBe(true)
    expect(store.getAll()).toEqual(INITIAL)
  })

  it('keeps stored ranges when an agent returns an empty or malformed list', async () => {
    const { client } = stubClient({
      'https://example.test/searchbot.json': { status: 200, data: '<html>maintenance</html>' },
      'https://example.test/chatgpt-user.json': prefixes('10.2.0.0/24'),
      'https://example.test/gptbot.json': prefixes(),
    })
    const refresher = new DatasetRefresher(store, SOURCES, client, { sleep })

    const outcome = await refresher.refresh()

    expect(outcome.ok).toBe(true)
    expect(outcome.warnings).toEqual([
      'Malformed response for searchbot: expected a prefixes list',
      'No IP data found for gptbot',
    ])
    expect(store.getAll()).toEqual({
      searchbot: ['192.0.2.0/24'],
      'chatgpt-user': ['10.2.0.0/24'],
      gptbot: ['198.51.100.0/24'],
    })
  })

  it('does not rewrite storage when upstream matches what is stored', async () => {
    const before = await fs.readFile(file)
    const replaceSpy = vi.spyOn(store, 'replace')
    const { client } = stubClient({
      'https://example.test/searchbot.json': prefixes(...INITIAL.searchbot),
      'https://example.test/chatgpt-user.json': prefixes(...INITIAL['chatgpt-user']),
      'https://example.test/gptbot.json': prefixes(...INITIAL.gptbot),
    })
    const refresher = new DatasetRefresher(store, SOURCES, client, { sleep })

    const outcome = await refresher.refresh()

    expect(outcome).toEqual({
      ok: true,
      merged: INITIAL,
      warnings: [],
      updatedAgents: ['searchbot', 'chatgpt-user', 'gptbot'],
      changed: false,
    })
    expect(replaceSpy).not.toHaveBeenCalled()
    expect((await fs.readFile(file)).equals(before)).toBe(true)
  })

  it('pauses at least one second between fetches and passes the timeout', async () => {
    const { client, get } = stubClient({
      'https://example.test/searchbot.json': prefixes('10.0.0.0/24'),
      'https://example.test/chatgpt-user.json': prefixes('10.2.0.0/24'),
      'https://example.test/gptbot.json': prefixes('10.1.0.0/16'),
    })
    const refresher = new DatasetRefresher(store, SOURCES, client, { sleep, requestDelayMs: 250 })

    await refresher.refresh()

    expect(sleep.mock.calls).toEqual([[1000], [1000]])
    expect(get.mock.calls.map(([url]) => url)).toEqual(SOURCES.map((source) => source.url))
    expect(get).toHaveBeenCalledWith('https://example.test/gptbot.json', { timeoutMs: 10_000 })
  })

  it('extracts IPv6 prefixes and keeps both ranges of a dual-stack entry', async () => {
    const { client } = stubClient({
      'https://example.test/gptbot.json': {
        status: 200,
        data: {
          prefixes: [
            { ipv6Prefix: '2001:db8::/32' },
            { ipv4Prefix: '10.0.0.0/8' },
            { ipv4Prefix: '203.0.113.0/24', ipv6Prefix: '2001:db8:1::/48' },
          ],
        },
      },
    })
    const refresher = new DatasetRefresher(store, [SOURCES[2]], client, { sleep })

    await refresher.refresh()

    expect(store.getAgent('gptbot')).toEqual(['2001:db8::/32', '10.0.0.0/8', '203.0.113.0/24', '2001:db8:1::/48'])
    expect(sleep).not.toHaveBeenCalled()
  })

  it('rejects an agent whose list mixes valid and invalid entries', async () => {
    const before = await fs.readFile(file)
    const { client } = stubClient({
      'https://example.test/searchbot.json': prefixes('10.0.0.0/24'),
      'https://example.test/gptbot.json': {
        status: 200,
        data: { prefixes: [{ ipv4Prefix: '10.1.0.0/16' }, { foo: 'x' }, { ipv4Prefix: '' }] },
      },
    })
    const refresher = new DatasetRefresher(store, [SOURCES[0], SOURCES[2]], client, { sleep })

    const outcome = await refresher.refresh()

    expect(outcome).toEqual({
      ok: true,
      merged: { ...INITIAL, searchbot: ['10.0.0.0/24'] },
      warnings: ['Malformed response for gptbot: expected a prefixes list'],
      updatedAgents: ['searchbot'],
      changed: true,
    })
    expect(store.getAgent('gptbot')).toEqual(['198.51.100.0/24'])
    expect((await fs.readFile(file)).equals(before)).toBe(false)
  })

  it('shares one run between concurrent callers', async () => {
    let respond: (response: UpstreamResponse) => void = () => {}
    const get = vi.fn(
      () =>
        new Promise<UpstreamResponse>((resolve) => {
          respond = resolve
        })
    )
    const refresher = new DatasetRefresher(store, [SOURCES[2]], { get }, { sleep })

    const first = refresher.refresh()
    const second = refresher.refresh()
    expect(second).toBe(first)
    expect(refresher.running).toBe(true)

    await vi.waitFor(() => expect(get).toHaveBeenCalledTimes(1))
    // Readers keep seeing the previous snapshot while the run is in flight.
    expect(store.getAgent('gptbot')).toEqual(['198.51.100.0/24'])

    respond(prefixes('10.1.0.0/16'))
    const [a, b] = await Promise.all([first, second])

    expect(a).toEqual(b)
    expect(get).toHaveBeenCalledTimes(1)
    expect(refresher.running).toBe(false)
    expect(store.getAgent('gptbot')).toEqual(['10.1.0.0/16'])
  })

  it('surfaces persistence failures without swapping the snapshot', async () => {
    vi.spyOn(store, 'replace').mockRejectedValue(new PersistenceUnavailableError('disk full'))
    const { client } = stubClient({ 'https://example.test/gptbot.json': prefixes('10.1.0.0/16') })
    const refresher = new DatasetRefresher(store, [SOURCES[2]], client, { sleep })

    await expect(refresher.refresh()).rejects.toBeInstanceOf(PersistenceUnavailableError)
    expect(store.getAgent('gptbot')).toEqual(['198.51.100.0/24'])
    expect(refresher.running).toBe(false)
  })

  it('fails when there are no sources to poll', async () => {
    const refresher = new DatasetRefresher(store, [], stubClient({}).client, { sleep })

    expect(await refresher.refresh()).toEqual({ ok: false, warnings: [] })
  })
})
