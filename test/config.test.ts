import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it } from 'node:test';

import { loadClientConfig, loadRelayConfig } from '../src/config.js';

describe('loadRelayConfig', () => {
  it('applies defaults', () => {
    const config = loadRelayConfig({});
    assert.equal(config.HOST, '0.0.0.0');
    assert.equal(config.PORT, 7000);
    assert.equal(config.PUBLIC_PORT_OFFSET, 0);
    assert.equal(config.TLS_ENABLED, false);
    assert.equal(config.ACK_TIMEOUT_MS, 5_000);
    assert.equal(config.HEARTBEAT_TIMEOUT_MS, 30_000);
  });

  it('requires certificate paths when TLS is on', () => {
    assert.throws(() => loadRelayConfig({ TLS_ENABLED: '1' }), /TLS_CERT_PATH is required when TLS_ENABLED=1/);
    assert.throws(
      () => loadRelayConfig({ TLS_ENABLED: '1', TLS_CERT_PATH: '/nonexistent/cert.pem', TLS_KEY_PATH: '/nonexistent/key.pem' }),
      /TLS_CERT_PATH does not exist: \/nonexistent\/cert\.pem/,
    );
  });

  it('accepts existing certificate files', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tunnelmux-config-'));
    try {
      const cert = path.join(dir, 'cert.pem');
      const key = path.join(dir, 'key.pem');
      fs.writeFileSync(cert, 'placeholder');
      fs.writeFileSync(key, 'placeholder');
      const config = loadRelayConfig({ TLS_ENABLED: '1', TLS_CERT_PATH: ` ${cert} `, TLS_KEY_PATH: key });
      assert.equal(config.TLS_ENABLED, true);
      assert.equal(config.TLS_CERT_PATH, cert);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('rejects malformed values', () => {
    assert.throws(() => loadRelayConfig({ PORT: 'seventy' }), /^Error: Invalid configuration:\n/);
    assert.throws(() => loadRelayConfig({ LOG_LEVEL: 'chatty' }), /Invalid configuration/);
  });
});

describe('loadClientConfig', () => {
  it('requires the relay host', () => {
    assert.throws(() => loadClientConfig({}), /Invalid configuration/);
  });

  it('converts second-based settings to milliseconds', () => {
    const config = loadClientConfig({
      RELAY_HOST: 'relay.test',
      SCAN_INTERVAL_SECONDS: '0.5',
      STABLE_TIME_SECONDS: '2',
      GRACE_SECONDS: '0',
      FULL_SCAN_INTERVAL_SECONDS: '1.25',
    });
    assert.equal(config.SCAN_INTERVAL_MS, 500);
    assert.equal(config.STABLE_TIME_MS, 2_000);
    assert.equal(config.GRACE_MS, 0);
    assert.equal(config.FULL_SCAN_INTERVAL_MS, 1_250);
    assert.equal(config.TLS_REJECT_UNAUTHORIZED, true);
    assert.equal(config.POOL_SIZE, 5);
  });

  it('parses port lists', () => {
    const config = loadClientConfig({ RELAY_HOST: 'relay.test', PORTS: '22, 80,,8080', EXCLUDE_PORTS: '' });
    assert.deepEqual(config.PORTS, [22, 80, 8080]);
    assert.deepEqual(config.EXCLUDE_PORTS, []);
    assert.throws(() => loadClientConfig({ RELAY_HOST: 'relay.test', PORTS: '22,http' }), /Invalid PORTS entry: http/);
    assert.throws(() => loadClientConfig({ RELAY_HOST: 'relay.test', EXCLUDE_PORTS: '70000' }), /Invalid EXCLUDE_PORTS entry: 70000/);
  });

  it('checks related bounds', () => {
    assert.throws(
      () => loadClientConfig({ RELAY_HOST: 'relay.test', RECONNECT_BASE_MS: '5000', RECONNECT_MAX_MS: '1000' }),
      /RECONNECT_MAX_MS must be >= RECONNECT_BASE_MS/,
    );
    assert.throws(
      () => loadClientConfig({ RELAY_HOST: 'relay.test', HEARTBEAT_INTERVAL_MS: '5000', HEARTBEAT_TIMEOUT_MS: '5000' }),
      /HEARTBEAT_TIMEOUT_MS must be greater than HEARTBEAT_INTERVAL_MS/,
    );
  });
});
