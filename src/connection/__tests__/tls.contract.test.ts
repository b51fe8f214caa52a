/**
 * TLS Contract Tests
 *
 * Handshake, certificate trust, liveness and session resumption against an
 * in-process TLS stub server with a generated self-signed certificate.
 */

import assert from 'node:assert/strict';
import { afterEach, describe, it } from 'node:test';

import { StubRpcServer, echoThenClose, getTestCertificate } from '@/__testutils__/index.js';
import { RpcClient } from '@/client/index.js';
import type { TlsSettings } from '@/config.js';
import { resolveClientConfig } from '@/config.js';
import { ConnectionManager, buildTlsOptions } from '@/connection/index.js';
import { ConnectionFailedError } from '@/errors/index.js';

const servers: StubRpcServer[] = [];
let client: RpcClient | null = null;

async function startTlsServer(port = 0): Promise<StubRpcServer> {
  const server = new StubRpcServer({ framing: 'http', tls: getTestCertificate() });
  servers.push(server);
  await server.start(port);
  return server;
}

function createClient(port: number, tls: Partial<TlsSettings>): RpcClient {
  client = new RpcClient({ port, tls });
  return client;
}

afterEach(async () => {
  await client?.close();
  client = null;
  await Promise.all(servers.splice(0).map((server) => server.stop()));
});

void describe('TLS transport', () => {
  void describe('certificate trust', () => {
    void it('accepts a self-signed certificate when allowed', async () => {
      const server = await startTlsServer();
      const client = createClient(server.port, { allowSelfSigned: true });

      const response = await client.invoke('echo', ['secure']);

      assert.equal(response.json, 'secure');
      assert.equal(client.connection?.encrypted, true);
    });

    void it('rejects an untrusted certificate', async () => {
      const server = await startTlsServer();
      const client = createClient(server.port, {});

      await assert.rejects(client.invoke('echo', [1]), ConnectionFailedError);
      assert.equal(server.requests.length, 0);
    });

    void it('accepts a certificate signed by a configured CA', async () => {
      const server = await startTlsServer();
      const client = createClient(server.port, { ca: getTestCertificate().cert });

      assert.equal((await client.invoke('echo', [7])).json, 7);
    });
  });

  void describe('liveness', () => {
    void it('reports closed right after the peer closes, without throwing', async () => {
      const server = await startTlsServer();
      const manager = new ConnectionManager(
        resolveClientConfig({ port: server.port, tls: { allowSelfSigned: true } })
      );
      try {
        await manager.ensureConnected();
        assert.equal(await manager.isClosed(), false);

        await server.closeClients();

        assert.equal(await manager.isClosed(), true);
      } finally {
        await manager.close();
      }
    });
  });

  void describe('reply then close', () => {
    void it('opens a new connection for every call', async () => {
      const server = await startTlsServer();
      server.handler = echoThenClose;
      const client = createClient(server.port, { allowSelfSigned: true });

      for (let i = 0; i < 10; i++) {
        assert.equal((await client.invoke('echo', [i])).json, i);
      }

      assert.equal(server.connections, 10);
      assert.equal(client.connection?.id, 10);
    });
  });

  void describe('session resumption', () => {
    void it('resumes the stored session on reconnect', async () => {
      const server = await startTlsServer();
      const client = createClient(server.port, { ca: getTestCertificate().cert });

      await client.invoke('echo', [1]);
      assert.equal(client.connection?.sessionReused, false);
      assert.notEqual(client.tlsSession, null);

      await server.closeClients();
      await client.invoke('echo', [2]);

      assert.equal(client.connection?.id, 2);
      assert.equal(client.connection?.sessionReused, true);
      assert.equal(server.resumedSessions, 1);
    });

    void it('performs full handshakes when resumption is disabled', async () => {
      const server = await startTlsServer();
      const client = createClient(server.port, { allowSelfSigned: true, sessionResumption: false });

      await client.invoke('echo', [1]);
      await server.closeClients();
      await client.invoke('echo', [2]);

      assert.equal(client.tlsSession, null);
      assert.equal(client.connection?.sessionReused, false);
      assert.equal(server.resumedSessions, 0);
    });

    void it('falls back to a full handshake when the server forgot the session', async () => {
      const first = await startTlsServer();
      const port = first.port;
      const client = createClient(port, { allowSelfSigned: true });
      await client.invoke('echo', [1]);
      const staleSession = client.tlsSession;

      await first.closeClients();
      await first.stop();
      const restarted = await startTlsServer(port);
      const response = await client.invoke('echo', [2]);

      assert.equal(response.json, 2);
      assert.equal(client.connection?.sessionReused, false);
      assert.equal(restarted.resumedSessions, 0);
      assert.notEqual(client.tlsSession, staleSession);
    });

    void it('drops the session and retries with a full handshake when a resumed handshake fails', async () => {
      const server = await startTlsServer();
      const client = createClient(server.port, { allowSelfSigned: true });
      await client.invoke('echo', [1]);
      const offered = client.tlsSession;
      assert.notEqual(offered, null);

      await server.closeClients();
      server.dropNextConnections(1);
      const response = await client.invoke('echo', [2]);

      assert.equal(response.json, 2);
      assert.equal(server.droppedConnections, 1);
      // Same server and ticket keys: offering the session again would have resumed it
      assert.equal(client.connection?.sessionReused, false);
      assert.equal(server.resumedSessions, 0);
      assert.notEqual(client.tlsSession, offered);
    });

    void it('does not retry a failed first handshake', async () => {
      const server = await startTlsServer();
      server.dropNextConnections(1);
      const client = createClient(server.port, { allowSelfSigned: true });

      await assert.rejects(client.invoke('echo', [1]), ConnectionFailedError);
      assert.equal(server.droppedConnections, 1);
      assert.equal(server.connections, 0);
    });

    void it('keeps the session across disconnect() and drops it on close()', async () => {
      const server = await startTlsServer();
      const client = createClient(server.port, { allowSelfSigned: true });

      await client.invoke('echo', [1]);
      await client.disconnect();
      assert.notEqual(client.tlsSession, null);

      await client.close();
      assert.equal(client.tlsSession, null);
    });
  });
});

void describe('buildTlsOptions', () => {
  const verified = { allowSelfSigned: false, sessionResumption: true };

  void it('sends SNI for host names only', () => {
    assert.equal(buildTlsOptions(verified, 'rpc.example.test', null).servername, 'rpc.example.test');
    assert.equal(buildTlsOptions(verified, '127.0.0.1', null).servername, undefined);
    assert.equal(buildTlsOptions(verified, '::1', null).servername, undefined);
  });

  void it('prefers an explicit server name', () => {
    const options = buildTlsOptions({ ...verified, servername: 'override.test' }, '10.0.0.1', null);

    assert.equal(options.servername, 'override.test');
  });

  void it('offers the session when given one', () => {
    const session = Buffer.from('test-session');

    assert.equal(buildTlsOptions(verified, 'localhost', session).session, session);
    assert.equal('session' in buildTlsOptions(verified, 'localhost', null), false);
  });

  void it('disables chain and hostname checks for self-signed servers', () => {
    const options = buildTlsOptions({ ...verified, allowSelfSigned: true }, 'localhost', null);

    assert.equal(options.rejectUnauthorized, false);
    assert.equal(typeof options.checkServerIdentity, 'function');
  });

  void it('leaves verification on by default', () => {
    const options = buildTlsOptions(verified, 'localhost', null);

    assert.equal(options.rejectUnauthorized, undefined);
    assert.equal(options.checkServerIdentity, undefined);
  });
});
