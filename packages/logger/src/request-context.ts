import { AsyncLocalStorage } from 'node:async_hooks'
import { randomUUID } from 'node:crypto'

/**
 * Per-request correlation data. Every log line written while a request is
 * being handled picks up these fields.
 */
export interface RequestContext {
  requestId: string
  method?: string
  path?: string
}

const storage = new AsyncLocalStorage<RequestContext>()

export function runWithRequestContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn)
}

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore()
}

/**
 * Reuse an inbound correlation id when it looks sane, otherwise mint one.
 */
export function resolveRequestId(inbound: string | undefined): string {
  if (inbound && /^[A-Za-z0-9._:-]{1,128}$/.test(inbound)) {
    return inbound
  }
  return randomUUID()
}
