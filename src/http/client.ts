import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import { APIError, classifyRemoteError, ConfigurationError, QuotaLimitedError } from '../errors.js'
import { logger as defaultLogger, type Logger } from '../logger.js'
import { FlagPatchSchema, parseRemoteEvaluation } from '../schema.js'
import type {
  AnalyticsEvent,
  AnalyticsSink,
  DefinitionSource,
  FetchDefinitionsRequest,
  FetchDefinitionsResult,
  FlagPatch,
  RemoteEvaluationRequest,
  RemoteEvaluationResponse,
  RemoteEvaluator,
  UpdateStream,
} from '../types.js'
import { readSSE } from './sse.js'

/** Configuration for the HTTP transport. */
export interface HTTPTransportConfig {
  /** Base URL of the analytics API, e.g. "https://flags.example.com" */
  host: string
  /** Public project key sent with evaluation requests and events */
  projectApiKey: string
  /** Secret key that authorises definition downloads */
  personalApiKey: string
  /**
   * Optional fetch implementation. Defaults to globalThis.fetch.
   * Inject a mock for testing.
   */
  fetch?: typeof globalThis.fetch
  log?: Logger
}

/** Every collaborator the flags client needs, over HTTP. */
export type HTTPTransport = DefinitionSource & RemoteEvaluator & AnalyticsSink & UpdateStream

const TransportConfigSchema = z.object({
  host: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//.test(value), 'host must be an http(s) URL')
    .transform((value) => value.replace(/\/+$/, '')),
  projectApiKey: z.string().min(1, 'projectApiKey is required'),
  personalApiKey: z.string().min(1, 'personalApiKey is required'),
})

/** Creates the fetch-based transport. Throws {@link ConfigurationError} on invalid config. */
export function createHTTPTransport(config: HTTPTransportConfig): HTTPTransport {
  const parsed = TransportConfigSchema.safeParse(config)
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid HTTP transport config',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }
  const { host, projectApiKey, personalApiKey } = parsed.data
  const fetchFn = config.fetch ?? globalThis.fetch
  const log = config.log ?? defaultLogger

  async function send(path: string, init: RequestInit): Promise<Response> {
    let res: Response
    try {
      res = await fetchFn(`${host}${path}`, init)
    } catch (err) {
      throw classifyRemoteError(err)
    }
    if (res.ok || res.status === 304) return res
    if (res.status === 402) throw new QuotaLimitedError()
    const text = await res.text().catch(() => '')
    throw new APIError(res.status, text.trim())
  }

  function postJSON(path: string, body: unknown, signal?: AbortSignal): Promise<Response> {
    return send(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    })
  }

  // DefinitionSource
  async function fetchDefinitions(request: FetchDefinitionsRequest): Promise<FetchDefinitionsResult> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${personalApiKey}`,
    }
    if (request.etag !== undefined) {
      headers['If-None-Match'] = request.etag
    }
    const res = await send(`/api/feature_flag/local_evaluation?token=${encodeURIComponent(projectApiKey)}&send_cohorts`, {
      method: 'GET',
      headers,
      signal: request.signal,
    })
    const etag = res.headers.get('ETag') ?? request.etag
    if (res.status === 304) {
      return etag !== undefined ? { notModified: true, etag } : { notModified: true }
    }
    const data: unknown = await res.json()
    return etag !== undefined ? { notModified: false, etag, data } : { notModified: false, data }
  }

  // RemoteEvaluator
  async function remoteEvaluate(request: RemoteEvaluationRequest, signal?: AbortSignal): Promise<RemoteEvaluationResponse> {
    const res = await postJSON(
      '/flags/?v=2',
      {
        api_key: projectApiKey,
        distinct_id: request.distinctId,
        person_properties: request.personProperties,
        groups: request.groups,
        group_properties: request.groupProperties,
      },
      signal,
    )
    const { quotaLimited, ...response } = parseRemoteEvaluation(await res.json())
    if (quotaLimited.includes('feature_flags')) throw new QuotaLimitedError()
    return response
  }

  // AnalyticsSink
  async function sendEvent(event: AnalyticsEvent): Promise<void> {
    const properties: Record<string, unknown> = { ...event.properties }
    if (event.groups) properties.$groups = event.groups
    await postJSON('/batch/', {
      api_key: projectApiKey,
      batch: [
        {
          event: event.event,
          distinct_id: event.distinctId,
          properties,
          uuid: randomUUID(),
          timestamp: new Date().toISOString(),
        },
      ],
    })
  }

  // UpdateStream
  async function* streamFlagUpdates(signal: AbortSignal): AsyncGenerator<FlagPatch> {
    const res = await send(`/flags/definitions/stream?token=${encodeURIComponent(projectApiKey)}`, {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${personalApiKey}`,
        Accept: 'text/event-stream',
      },
      signal,
    })
    if (!res.body) throw new APIError(res.status, 'SSE response has no body')

    for await (const event of readSSE(res.body)) {
      let decoded: unknown
      try {
        decoded = JSON.parse(event.data)
      } catch (err) {
        log.warn({ err, eventId: event.id }, 'Skipping malformed flag update event')
        continue
      }
      const patch = FlagPatchSchema.safeParse(decoded)
      if (!patch.success) {
        log.warn({ eventId: event.id, issues: patch.error.issues }, 'Skipping invalid flag update event')
        continue
      }
      yield patch.data
    }
  }

  return { fetchDefinitions, remoteEvaluate, sendEvent, streamFlagUpdates }
}
