/**
 * Event Channel
 *
 * Typed publish/subscribe created per engine. Handler failures are logged and
 * never reach the publisher.
 */

import type { Instant, LocalDate } from './time-date'
import { type Logger, silentLogger } from './logger'

export type EngineEvents = {
  pendingRecurrenceCreated: { ticketId: string; sourceTaskId: string; scheduledDate: Instant }
  taskChanged: { taskId: string }
  habitReplenished: { habitId: string; instanceDate: LocalDate }
}

export type EngineEventName = keyof EngineEvents

export type EventHandler<K extends EngineEventName> = (payload: EngineEvents[K]) => void

type HandlerMap = { [K in EngineEventName]: Set<EventHandler<K>> }

export interface EventChannel {
  /** Returns an unsubscribe function. */
  on<K extends EngineEventName>(event: K, handler: EventHandler<K>): () => void
  /** Returns false when any handler threw. */
  emit<K extends EngineEventName>(event: K, payload: EngineEvents[K]): boolean
  listenerCount(event: EngineEventName): number
}

export function createEventChannel(logger: Logger = silentLogger): EventChannel {
  const handlers: HandlerMap = {
    pendingRecurrenceCreated: new Set(),
    taskChanged: new Set(),
    habitReplenished: new Set(),
  }

  function setFor<K extends EngineEventName>(event: K): Set<EventHandler<K>> {
    return handlers[event]
  }

  return {
    on(event, handler) {
      const set = setFor(event)
      set.add(handler)
      return () => {
        set.delete(handler)
      }
    },

    emit(event, payload) {
      let hadErrors = false
      for (const handler of [...setFor(event)]) {
        try {
          handler(payload)
        } catch (e) {
          hadErrors = true
          logger.error(`Event handler error on '${event}'`, {
            error: e instanceof Error ? e.message : String(e),
          })
        }
      }
      return !hadErrors
    },

    listenerCount(event) {
      return handlers[event].size
    },
  }
}
