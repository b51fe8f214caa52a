/**
 * tlsFixtures - Self-signed certificate for TLS contract tests
 *
 * Generated on first use and cached for the rest of the test file.
 */

import { generate } from 'selfsigned';

export interface TestCertificate {
  key: string;
  cert: string;
}

let cached: TestCertificate | null = null;

/**
 * Certificate for `localhost` / `127.0.0.1`, usable both as server
 * certificate and as the client's trusted CA.
 */
export function getTestCertificate(): TestCertificate {
  if (cached) {
    return cached;
  }
  const pems = generate([{ name: 'commonName', value: 'localhost' }], {
    days: 1,
    keySize: 2048,
    algorithm: 'sha256',
    extensions: [
      { name: 'basicConstraints', cA: true },
      { name: 'keyUsage', keyCertSign: true, digitalSignature: true, keyEncipherment: true },
      { name: 'extKeyUsage', serverAuth: true },
      {
        name: 'subjectAltName',
        altNames: [
          { type: 2, value: 'localhost' },
          { type: 7, ip: '127.0.0.1' },
        ],
      },
    ],
  });
  cached = { key: pems.private, cert: pems.cert };
  return cached;
}
