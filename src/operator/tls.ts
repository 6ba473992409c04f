import { generateKeyPairSync } from 'node:crypto'

import forge from 'node-forge'

const DEFAULT_KEY_SIZE = 2048
const DEFAULT_PUBLIC_EXPONENT = 65537

export type TlsPrimitives = {
  generatePrivateKey: () => string
  generateCsr: (request: { privateKey: string; subject: string; sansDns: string[] }) => string
}

/** RSA private key in PKCS#1 PEM form. */
export const generatePrivateKey = (keySize = DEFAULT_KEY_SIZE) =>
  generateKeyPairSync('rsa', {
    modulusLength: keySize,
    publicExponent: DEFAULT_PUBLIC_EXPONENT,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
  }).privateKey

export const generateCsr = (request: { privateKey: string; subject: string; sansDns: string[] }) => {
  const privateKey = forge.pki.privateKeyFromPem(request.privateKey)
  const csr = forge.pki.createCertificationRequest()
  csr.publicKey = forge.pki.setRsaPublicKey(privateKey.n, privateKey.e)
  csr.setSubject([{ name: 'commonName', value: request.subject }])
  if (request.sansDns.length > 0) {
    csr.setAttributes([
      {
        name: 'extensionRequest',
        extensions: [
          {
            name: 'subjectAltName',
            altNames: request.sansDns.map((value) => ({ type: 2, value })),
          },
        ],
      },
    ])
  }
  csr.sign(privateKey, forge.md.sha256.create())
  return forge.pki.certificationRequestToPem(csr).trim()
}

export const defaultTlsPrimitives: TlsPrimitives = {
  generatePrivateKey: () => generatePrivateKey(),
  generateCsr,
}
