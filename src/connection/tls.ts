/**
 * TLS options for outgoing connections.
 */

import { isIP } from 'node:net';

import type { ConnectionOptions } from 'node:tls';

import type { TlsSettings } from '@/config.js';

/**
 * Map TLS settings to the options of `tls.connect()`, minus host and port.
 *
 * `allowSelfSigned` turns off both certificate-chain and hostname verification.
 * SNI is sent for hostnames only; Node rejects an IP address as server name.
 */
export function buildTlsOptions(
  settings: Readonly<TlsSettings>,
  host: string,
  session: Buffer | null
): Omit<ConnectionOptions, 'host' | 'port'> {
  const servername = settings.servername ?? (isIP(host) === 0 ? host : undefined);

  return {
    ...(settings.ca !== undefined && { ca: settings.ca }),
    ...(settings.cert !== undefined && { cert: settings.cert }),
    ...(settings.key !== undefined && { key: settings.key }),
    ...(servername !== undefined && { servername }),
    ...(session !== null && { session }),
    ...(settings.allowSelfSigned && {
      rejectUnauthorized: false,
      checkServerIdentity: () => undefined,
    }),
  };
}
