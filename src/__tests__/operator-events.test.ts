import { describe, expect, it } from 'vitest'

import { InvalidEventError } from '~/operator/errors'
import { decodeOperatorEvent, isOperatorEventKind, parseOperatorEvent } from '~/operator/events'

describe('operator events', () => {
  it('accepts lifecycle events without a payload', () => {
    expect(parseOperatorEvent('ausf-pebble-ready')).toEqual({ kind: 'ausf-pebble-ready' })
    expect(parseOperatorEvent('update-status', {})).toEqual({ kind: 'update-status' })
  })

  it('decodes certificate availability with optional chain', () => {
    expect(
      parseOperatorEvent('certificate-available', {
        certificate: 'cert-1',
        certificateSigningRequest: 'csr-1',
        chain: ['ca-1'],
      }),
    ).toEqual({
      kind: 'certificate-available',
      certificate: 'cert-1',
      certificateSigningRequest: 'csr-1',
      chain: ['ca-1'],
    })
  })

  it('lets the hook kind win over the payload kind', () => {
    expect(parseOperatorEvent('certificate-expiring', { kind: 'update-status', certificate: 'cert-1' })).toEqual({
      kind: 'certificate-expiring',
      certificate: 'cert-1',
    })
  })

  it('rejects unknown kinds', () => {
    expect(isOperatorEventKind('config-changed')).toBe(false)
    expect(() => parseOperatorEvent('config-changed')).toThrow(InvalidEventError)
  })

  it('rejects payloads that are not objects', () => {
    expect(() => parseOperatorEvent('certificate-expiring', ['cert-1'])).toThrow(
      'Invalid certificate-expiring event: payload must be a JSON object',
    )
  })

  it('rejects certificate events missing their pem fields', () => {
    expect(() => parseOperatorEvent('certificate-available', { certificate: 'cert-1' })).toThrow(InvalidEventError)
    expect(() =>
      parseOperatorEvent('certificate-available', { certificate: 'cert-1', certificateSigningRequest: '' }),
    ).toThrow(InvalidEventError)
  })

  it('names the offending kind when decoding raw input', () => {
    try {
      decodeOperatorEvent({ kind: 'certificate-expiring' })
      expect.unreachable('decode should fail')
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidEventError)
      expect(error instanceof InvalidEventError ? error.kind : null).toBe('certificate-expiring')
    }
  })
})
