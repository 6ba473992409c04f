import type { NetworkInterfaceInfo } from 'node:os'

import { describe, expect, it } from 'vitest'

import { createPodAddressResolver, firstExternalIpv4 } from '~/operator/pod-address'

const ipv4 = (address: string, internal: boolean): NetworkInterfaceInfo => ({
  address,
  netmask: '255.255.255.0',
  family: 'IPv4',
  mac: '00:00:00:00:00:00',
  internal,
  cidr: `${address}/24`,
})

const ipv6 = (address: string): NetworkInterfaceInfo => ({
  address,
  netmask: 'ffff:ffff:ffff:ffff::',
  family: 'IPv6',
  mac: '00:00:00:00:00:00',
  internal: false,
  cidr: `${address}/64`,
  scopeid: 0,
})

const interfaces = () => ({
  lo: [ipv4('127.0.0.1', true)],
  eth0: [ipv6('fd00::5'), ipv4('10.1.2.3', false)],
})

describe('pod address resolver', () => {
  it('picks the first external ipv4 address', () => {
    expect(firstExternalIpv4(interfaces())).toBe('10.1.2.3')
    expect(firstExternalIpv4({ lo: [ipv4('127.0.0.1', true)] })).toBeNull()
  })

  it('prefers POD_IP when it is an ipv4 address', async () => {
    const resolver = createPodAddressResolver({ env: { POD_IP: '10.9.9.9' }, interfaces })
    await expect(resolver.currentPodAddress()).resolves.toBe('10.9.9.9')
  })

  it('falls back to interfaces when POD_IP is not usable', async () => {
    const resolver = createPodAddressResolver({ env: { POD_IP: 'pending' }, interfaces })
    await expect(resolver.currentPodAddress()).resolves.toBe('10.1.2.3')
  })

  it('returns null without any external address', async () => {
    const resolver = createPodAddressResolver({ env: {}, interfaces: () => ({}) })
    await expect(resolver.currentPodAddress()).resolves.toBeNull()
  })
})
