import * as S from '@effect/schema/Schema'
import { formatErrorSync } from '@effect/schema/TreeFormatter'
import * as Either from 'effect/Either'

import { asRecord } from './env-config'
import { InvalidEventError } from './errors'

const Pem = S.String.pipe(S.minLength(1))

export const RECONCILE_EVENT_KINDS = [
  'ausf-pebble-ready',
  'fiveg-nrf-relation-joined',
  'nrf-available',
  'certificates-relation-created',
  'certificates-relation-joined',
  'certificates-relation-broken',
  'update-status',
] as const

const LifecycleEventSchema = S.Struct({
  kind: S.Literal(...RECONCILE_EVENT_KINDS),
})

const CertificateAvailableEventSchema = S.Struct({
  kind: S.Literal('certificate-available'),
  certificate: Pem,
  certificateSigningRequest: Pem,
  ca: S.optional(S.String),
  chain: S.optional(S.Array(S.String)),
})

const CertificateExpiringEventSchema = S.Struct({
  kind: S.Literal('certificate-expiring'),
  certificate: Pem,
  expiry: S.optional(S.String),
})

export const OperatorEventSchema = S.Union(
  LifecycleEventSchema,
  CertificateAvailableEventSchema,
  CertificateExpiringEventSchema,
)

export type OperatorEvent = S.Schema.Type<typeof OperatorEventSchema>
export type OperatorEventKind = OperatorEvent['kind']

export const OPERATOR_EVENT_KINDS: readonly OperatorEventKind[] = [
  ...RECONCILE_EVENT_KINDS,
  'certificate-available',
  'certificate-expiring',
]

export const isOperatorEventKind = (value: string): value is OperatorEventKind =>
  OPERATOR_EVENT_KINDS.some((kind) => kind === value)

export const decodeOperatorEvent = (input: unknown): OperatorEvent => {
  const decoded = S.decodeUnknownEither(OperatorEventSchema)(input)
  if (Either.isLeft(decoded)) {
    const kind = asRecord(input)?.kind
    throw new InvalidEventError(typeof kind === 'string' ? kind : 'unknown', formatErrorSync(decoded.left))
  }
  return decoded.right
}

/** Builds an event from a hook kind and an optional JSON payload carrying its fields. */
export const parseOperatorEvent = (kind: string, payload?: unknown): OperatorEvent => {
  if (!isOperatorEventKind(kind)) {
    throw new InvalidEventError(kind, `unknown event kind, expected one of ${OPERATOR_EVENT_KINDS.join(', ')}`)
  }
  if (payload == null) return decodeOperatorEvent({ kind })
  const record = asRecord(payload)
  if (!record) {
    throw new InvalidEventError(kind, 'payload must be a JSON object')
  }
  return decodeOperatorEvent({ ...record, kind })
}
