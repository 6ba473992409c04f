import { join } from 'node:path'

import * as S from '@effect/schema/Schema'
import * as Either from 'effect/Either'

import type { Logger } from '~/logger'

import { OperatorError } from './errors'
import { type OperatorEvent, OperatorEventSchema } from './events'
import { readJsonFile, writeJsonFile } from './host-state'
import { stableJsonStringify } from './service-spec'

export const DEFERRED_EVENTS_FILE = 'deferred-events.json'

const DeferredEventsSchema = S.Struct({
  events: S.Array(OperatorEventSchema),
})

export interface DeferredEventQueue {
  load: () => Promise<OperatorEvent[]>
  save: (events: readonly OperatorEvent[]) => Promise<void>
}

export const dedupeEvents = (events: readonly OperatorEvent[]) => {
  const seen = new Set<string>()
  const output: OperatorEvent[] = []
  for (const event of events) {
    const key = stableJsonStringify(event)
    if (seen.has(key)) continue
    seen.add(key)
    output.push(event)
  }
  return output
}

export const createFileDeferredEventQueue = (deps: { stateDir: string; logger: Logger }): DeferredEventQueue => {
  const path = join(deps.stateDir, DEFERRED_EVENTS_FILE)

  return {
    load: async () => {
      let raw: unknown
      try {
        raw = await readJsonFile(path)
      } catch (error) {
        if (!(error instanceof OperatorError)) throw error
        deps.logger.warn({ path, err: error }, 'discarding unreadable deferred event queue')
        return []
      }
      if (raw == null) return []
      const decoded = S.decodeUnknownEither(DeferredEventsSchema)(raw)
      if (Either.isLeft(decoded)) {
        deps.logger.warn({ path }, 'discarding unreadable deferred event queue')
        return []
      }
      return [...decoded.right.events]
    },
    save: async (events) => {
      await writeJsonFile(path, { events: dedupeEvents(events) })
    },
  }
}

export const createMemoryDeferredEventQueue = (initial: readonly OperatorEvent[] = []): DeferredEventQueue => {
  let events = [...initial]
  return {
    load: async () => [...events],
    save: async (next) => {
      events = dedupeEvents(next)
    },
  }
}
