export function sseEvent(event: string, data?: unknown) {
  let payload = `event: ${event}\n`

  if (data !== undefined) {
    const body = typeof data === 'string' ? data : JSON.stringify(data)
    for (const line of body.split('\n')) {
      payload += `data: ${line}\n`
    }
  }

  payload += '\n'
  return payload
}

export function sseRetry(retryMs: number) {
  return `retry: ${retryMs}\n\n`
}

export const SSE_PING = ': ping\n\n'
