import { isIPv4 } from 'node:net'
import { networkInterfaces } from 'node:os'

import { readEnv } from './env-config'
import type { PodAddressResolver } from './precondition-gate'

type InterfaceAddresses = ReturnType<typeof networkInterfaces>

export const firstExternalIpv4 = (interfaces: InterfaceAddresses) => {
  for (const addresses of Object.values(interfaces)) {
    for (const address of addresses ?? []) {
      if (address.family === 'IPv4' && !address.internal) return address.address
    }
  }
  return null
}

export const createPodAddressResolver = (
  options: { env?: NodeJS.ProcessEnv; interfaces?: () => InterfaceAddresses } = {},
): PodAddressResolver => ({
  currentPodAddress: async () => {
    const fromEnv = readEnv(options.env ?? process.env, 'POD_IP')
    if (fromEnv && isIPv4(fromEnv)) return fromEnv
    return firstExternalIpv4((options.interfaces ?? networkInterfaces)())
  },
})
