import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { describe, it, expect } from 'vitest'
import request from 'supertest'
import type { Express } from 'express'
import { createApp } from '../app.js'
import { buildSearchResponse } from '../routes/search.js'
import { createTelegramAdapter } from '../../scraper/adapters/index.js'
import { ResultCache } from '../../scraper/cache/result-cache.js'
import { AdaptiveConcurrencyLimiter } from '../../scraper/concurrency/adaptive-limiter.js'
import { FetchError } from '../../scraper/errors.js'
import { SearchOrchestrator } from '../../scraper/orchestrator.js'
import type { SearchOutcome } from '../../scraper/orchestrator.js'
import { InMemorySourceRegistry } from '../../scraper/registry.js'
import type { FetchRequest, FetchResponse, Fetcher, ResourceResult } from '../../scraper/types.js'
import { testProviders } from '../../scraper/__tests__/fixtures/providers.js'

const CHANNEL_PAGE = readFileSync(
  fileURLToPath(
    new URL('../../scraper/adapters/telegram/__tests__/fixtures/channel.html', import.meta.url)
  ),
  'utf8'
)

class PageFetcher implements Fetcher {
  readonly urls: string[] = []

  constructor(private readonly fail = false) {}

  async fetch(req: FetchRequest): Promise<FetchResponse> {
    this.urls.push(req.url)
    if (this.fail) {
      throw new FetchError('exhausted', 'Gave up after 3 attempts: HTTP 503', {
        url: req.url,
        attempts: 3,
        statusCode: 503,
        lastCause: new Error('HTTP 503: Service Unavailable'),
      })
    }
    return { url: req.url, statusCode: 200, body: CHANNEL_PAGE, attempts: 1, durationMs: 1 }
  }
}

function buildApp(fetcher: Fetcher = new PageFetcher()): Express {
  const registry = new InMemorySourceRegistry()
  registry.register(createTelegramAdapter(['testchannel']))

  const orchestrator = new SearchOrchestrator({
    fetcher,
    registry,
    providers: testProviders(),
    limiter: new AdaptiveConcurrencyLimiter({ min: 1, max: 4, initial: 4 }),
    cache: new ResultCache<ResourceResult[]>({ ttlMs: 60_000 }),
  })

  return createApp({ orchestrator, registry, now: () => 1_000 })
}

describe('GET /api/search', () => {
  it('returns links merged by provider type', async () => {
    const res = await request(buildApp()).get('/api/search').query({ kw: 'Example' })

    expect(res.status).toBe(200)
    expect(res.body).toEqual({
      code: 0,
      message: 'success',
      data: {
        total: 1,
        merged_by_type: {
          baidu: [
            {
              url: 'https://pan.example.com/s/abc123',
              password: '8f2k',
              note: 'Example Movie 2024',
              datetime: '2026-03-01T10:00:00.000Z',
              source: 'telegram',
            },
          ],
        },
        timed_out: false,
        from_cache: false,
        failures: [],
      },
    })
  })

  it('returns individual results, newest first, when asked', async () => {
    const res = await request(buildApp())
      .get('/api/search')
      .query({ kw: 'Example', res: 'results', filter: 'false' })

    expect(res.status).toBe(200)
    expect(res.body.data.total).toBe(2)
    expect(res.body.data.merged_by_type).toBeUndefined()
    expect(res.body.data.results[0]).toEqual({
      message_id: 'testchannel_102',
      source: 'telegram',
      title: '资源：Another Show',
      content: '资源：Another Show\n下载：点击下载',
      datetime: '2026-03-02T08:30:00.000Z',
      links: [{ type: 'quark', url: 'https://drive.example.org/s/xyz789', password: '' }],
    })
    expect(res.body.data.results[1].message_id).toBe('testchannel_101')
  })

  it('fetches the requested channels instead of the configured ones', async () => {
    const fetcher = new PageFetcher()

    await request(buildApp(fetcher)).get('/api/search').query({ kw: 'Example', channels: 'one,two' })

    expect([...fetcher.urls].sort()).toEqual([
      'https://t.me/s/one?q=Example',
      'https://t.me/s/two?q=Example',
    ])
  })

  it('serves a repeated query from the cache', async () => {
    const fetcher = new PageFetcher()
    const app = buildApp(fetcher)

    await request(app).get('/api/search').query({ kw: 'Example' })
    const res = await request(app).get('/api/search').query({ kw: 'example' })

    expect(res.body.data.from_cache).toBe(true)
    expect(fetcher.urls).toHaveLength(1)
  })

  it('rejects a missing keyword', async () => {
    const res = await request(buildApp()).get('/api/search')

    expect(res.status).toBe(400)
    expect(res.body).toEqual({
      code: 400,
      message: 'Please check your input and try again',
      data: {
        error_code: 'VALIDATION_FAILED',
        validation_errors: [{ path: 'kw', message: 'kw is required', code: 'invalid_type' }],
      },
    })
  })

  it('rejects a blank keyword and unknown provider types', async () => {
    const app = buildApp()

    const blank = await request(app).get('/api/search').query({ kw: '   ' })
    const unknown = await request(app).get('/api/search').query({ kw: 'Example', cloud_types: 'dropbox' })

    expect(blank.status).toBe(400)
    expect(blank.body.data.validation_errors[0].message).toBe('kw is required')
    expect(unknown.status).toBe(400)
    expect(unknown.body.data.validation_errors[0].path).toBe('cloud_types.0')
  })

  it('answers 502 when every source failed', async () => {
    const res = await request(buildApp(new PageFetcher(true))).get('/api/search').query({ kw: 'Example' })

    expect(res.status).toBe(502)
    expect(res.body).toEqual({
      code: 502,
      message: 'No source could be searched. Please try again later',
      data: { error_code: 'ALL_SOURCES_FAILED' },
    })
  })
})

describe('POST /api/search', () => {
  it('accepts a JSON body with list parameters', async () => {
    const res = await request(buildApp())
      .post('/api/search')
      .send({ kw: 'Example', res: 'all', cloud_types: ['quark'], filter: false })

    expect(res.status).toBe(200)
    expect(res.body.data.total).toBe(1)
    expect(res.body.data.results.map((r: { message_id: string }) => r.message_id)).toEqual([
      'testchannel_102',
    ])
    expect(Object.keys(res.body.data.merged_by_type)).toEqual(['quark'])
  })

  it('rejects malformed JSON as a validation failure', async () => {
    const res = await request(buildApp())
      .post('/api/search')
      .set('Content-Type', 'application/json')
      .send('{"kw":')

    expect(res.status).toBe(400)
    expect(res.body.data.error_code).toBe('VALIDATION_FAILED')
  })
})

describe('service routes', () => {
  it('reports health with the registered sources', async () => {
    const res = await request(buildApp()).get('/health')

    expect(res.status).toBe(200)
    expect(res.body).toEqual({ status: 'ok', sources: ['telegram'], uptimeSeconds: 0 })
  })

  it('answers unknown routes with a 404 envelope', async () => {
    const res = await request(buildApp()).get('/nope')

    expect(res.status).toBe(404)
    expect(res.body).toEqual({ code: 404, message: 'Route GET /nope not found' })
  })
})

describe('buildSearchResponse', () => {
  const outcome: SearchOutcome = {
    results: [
      {
        id: 'chan_1',
        source: 'telegram',
        title: 'Weekly bundle',
        content: 'Example Movie\n链接：https://drive.example.org/s/a1\nOther Show\n链接：https://drive.example.org/s/b2',
        timestamp: '2026-03-03T10:00:00.000Z',
        links: [
          { url: 'https://drive.example.org/s/a1', providerType: 'quark', origin: 'none' },
          { url: 'https://drive.example.org/s/b2', providerType: 'quark', origin: 'none' },
        ],
      },
    ],
    fromCache: false,
    timedOut: false,
    failures: [],
    stats: { targets: 1, succeeded: 1, failed: 0, cancelled: 0, durationMs: 1 },
  }

  it('narrows merged links to the keyword when one is given', () => {
    const narrowed = buildSearchResponse(outcome, 'merge', 'example')
    const full = buildSearchResponse(outcome, 'merge')

    expect(narrowed.total).toBe(1)
    expect(narrowed.merged_by_type?.quark?.map((l) => l.note)).toEqual(['Example Movie'])
    expect(full.total).toBe(2)
  })
})
