import type { Writable } from 'node:stream'

import pino, { type Logger, multistream } from 'pino'
import { pinoLoki } from 'pino-loki'

import { parseBooleanEnv } from '~/operator/env-config'

export type { Logger }

export type LokiStreamFactory = (options: Parameters<typeof pinoLoki>[0]) => Writable

export type LoggerHandle = {
  logger: Logger
  /** Flushes and ends the Loki stream; its batching timer otherwise keeps the process alive. */
  close: () => Promise<void>
}

const endStream = (stream: Writable) =>
  new Promise<void>((resolve, reject) => {
    if (stream.destroyed) {
      resolve()
      return
    }
    stream.once('close', () => resolve())
    stream.once('error', reject)
    stream.end()
  })

export const createLogger = (
  env: NodeJS.ProcessEnv = process.env,
  createLokiStream: LokiStreamFactory = pinoLoki,
): LoggerHandle => {
  const level = env.LOG_LEVEL ?? 'info'
  const service = env.AUSF_OPERATOR_APP_NAME ? `${env.AUSF_OPERATOR_APP_NAME}-operator` : 'ausf-operator'
  const namespace = env.POD_NAMESPACE ?? 'default'
  const lokiEndpoint = env.LGTM_LOKI_ENDPOINT
  const lokiBasicAuth = parseLokiBasicAuth(env.LGTM_LOKI_BASIC_AUTH)
  const lokiDisabled = parseBooleanEnv(env.LOKI_DISABLED, false)

  const destinations: { stream: NodeJS.WritableStream }[] = [{ stream: process.stdout }]
  let lokiStream: Writable | null = null

  if (lokiEndpoint && !lokiDisabled) {
    try {
      lokiStream = createLokiStream({
        host: lokiEndpoint,
        batching: true,
        interval: 5,
        timeout: 5000,
        replaceTimestamp: true,
        labels: {
          service,
          namespace,
        },
        basicAuth: lokiBasicAuth,
      })

      destinations.push({ stream: lokiStream })
    } catch (error) {
      // stdout stays available when the Loki transport cannot be initialised
      console.warn('failed to initialise pino-loki transport', error)
    }
  }

  const logger = pino(
    {
      level,
      base: {
        service,
        namespace,
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    multistream(destinations),
  )

  return {
    logger,
    close: async () => {
      const stream = lokiStream
      lokiStream = null
      if (stream) await endStream(stream)
    },
  }
}

function parseLokiBasicAuth(value?: string) {
  if (!value) {
    return undefined
  }
  const direct = parseUserPass(value)
  if (direct) {
    return direct
  }
  const decoded = Buffer.from(value, 'base64').toString('utf8')
  return parseUserPass(decoded)
}

function parseUserPass(value: string) {
  const [username, ...rest] = value.split(':')
  if (!username || rest.length === 0) {
    return undefined
  }
  const password = rest.join(':')
  if (!password) {
    return undefined
  }
  return { username, password }
}
