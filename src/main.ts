import { readFile } from 'node:fs/promises'

import { ManagedRuntime } from 'effect'

import { createLogger, type Logger } from './logger'
import { readEnv } from './operator/env-config'
import { dispatchEffect, makeAusfOperatorLive } from './operator/index'
import { parseOperatorEvent } from './operator/events'
import { formatUnitStatus } from './operator/types'

const USAGE = 'usage: ausf-operator <event-kind> [payload.json]'

const readPayload = async (path: string | undefined) => {
  if (path) return JSON.parse(await readFile(path, 'utf8')) as unknown
  const inline = readEnv(process.env, 'AUSF_OPERATOR_EVENT_PAYLOAD')
  return inline ? (JSON.parse(inline) as unknown) : undefined
}

const dispatchHookEvent = async (logger: Logger) => {
  const kind = process.argv[2] ?? readEnv(process.env, 'AUSF_OPERATOR_EVENT')
  if (!kind) {
    console.error(USAGE)
    process.exitCode = 2
    return
  }

  const runtime = ManagedRuntime.make(makeAusfOperatorLive(logger))
  try {
    const event = parseOperatorEvent(kind, await readPayload(process.argv[3]))
    const report = await runtime.runPromise(dispatchEffect(event))
    logger.info(
      {
        handled: report.handled,
        deferred: report.deferred,
        status: report.status ? formatUnitStatus(report.status) : null,
      },
      'dispatch finished',
    )
  } catch (error) {
    logger.error({ err: error, event: kind }, 'dispatch failed')
    process.exitCode = 1
  } finally {
    await runtime.dispose()
  }
}

const main = async () => {
  const { logger, close } = createLogger()
  try {
    await dispatchHookEvent(logger)
  } finally {
    await close()
  }
}

main().catch((error: unknown) => {
  console.error('ausf-operator failed', error)
  process.exitCode = 1
})
