/** One dispatched server-sent event. */
export interface SSEEvent {
  /** Empty when the stream sent no `event:` field */
  type: string
  data: string
  id?: string
}

/**
 * Reads server-sent events from a fetch body. Multi-line `data:` fields are
 * joined with newlines, comment lines are ignored, and an event is
 * dispatched on each blank line that follows at least one `data:` field.
 */
export async function* readSSE(body: ReadableStream<Uint8Array>): AsyncGenerator<SSEEvent> {
  const reader = body.getReader()
  const decoder = new TextDecoder()
  let buf = ''
  // Per-event accumulators
  let eventType = ''
  let dataLines: string[] = []
  let eventId: string | undefined

  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) break
      buf += decoder.decode(value, { stream: true })
      const lines = buf.split('\n')
      buf = lines.pop() ?? ''

      for (const rawLine of lines) {
        const line = rawLine.replace(/\r$/, '')
        if (line === '') {
          if (dataLines.length > 0) {
            const event: SSEEvent = { type: eventType, data: dataLines.join('\n') }
            if (eventId !== undefined) event.id = eventId
            yield event
          }
          eventType = ''
          dataLines = []
          eventId = undefined
        } else if (line.startsWith('id:')) {
          eventId = line.slice(3).trimStart()
        } else if (line.startsWith('event:')) {
          eventType = line.slice(6).trimStart()
        } else if (line.startsWith('data:')) {
          dataLines.push(line.slice(5).trimStart())
        }
      }
    }
  } finally {
    await reader.cancel().catch(() => undefined)
  }
}
