import { describe, it, expect, vi } from 'vitest';
import { DEVICE_CODE_GRANT, DevicePoller, parseDeviceAuthorization } from '../src/auth/device-poller.js';
import type { DeviceAuthorization } from '../src/types/token.js';
import { FakeTransport, manualClock } from './helpers/fake-transport.js';

const DEVICE_ENDPOINT = 'https://id.example.com/device/code';
const TOKEN_ENDPOINT = 'https://id.example.com/token';

function deviceReply(overrides: Record<string, unknown> = {}) {
  return {
    device_code: 'dev-1',
    user_code: 'ABCD-EFGH',
    verification_uri: 'https://id.example.com/device',
    expires_in: 600,
    interval: 5,
    ...overrides,
  };
}

function createPoller(transport: FakeTransport, clock = manualClock()) {
  const poller = new DevicePoller({
    clientId: 'test-client',
    deviceAuthorizationEndpoint: DEVICE_ENDPOINT,
    tokenEndpoint: TOKEN_ENDPOINT,
    scope: 'read',
    transport,
    now: clock.now,
    sleep: clock.sleep,
  });
  return { poller, clock };
}

describe('parseDeviceAuthorization', () => {
  it('should default the interval to 5 seconds', () => {
    const { interval, ...withoutInterval } = deviceReply();
    expect(interval).toBe(5);
    expect(parseDeviceAuthorization({ ...withoutInterval }).interval).toBe(5);
  });

  it('should accept verification_url', () => {
    const { verification_uri, ...rest } = deviceReply();
    const parsed = parseDeviceAuthorization({ ...rest, verification_url: verification_uri });
    expect(parsed.verification_uri).toBe('https://id.example.com/device');
  });

  it('should keep verification_uri_complete', () => {
    const parsed = parseDeviceAuthorization(deviceReply({ verification_uri_complete: 'https://id.example.com/device?code=ABCD' }));
    expect(parsed.verification_uri_complete).toBe('https://id.example.com/device?code=ABCD');
  });

  it('should reject responses missing required fields', () => {
    expect(() => parseDeviceAuthorization(deviceReply({ device_code: undefined }))).toThrow('Missing required field: device_code');
    expect(() => parseDeviceAuthorization(deviceReply({ expires_in: 0 }))).toThrow('Missing required field: expires_in');
  });
});

describe('DevicePoller', () => {
  it('should request codes with client_id and scope', async () => {
    const transport = new FakeTransport().reply(200, deviceReply());
    const { poller } = createPoller(transport);

    const authorization = await poller.requestAuthorization();

    expect(authorization.user_code).toBe('ABCD-EFGH');
    expect(transport.calls).toEqual([{ url: DEVICE_ENDPOINT, params: { client_id: 'test-client', scope: 'read' } }]);
    expect(poller.state).toBe('REQUESTING');
  });

  it('should poll until the user approves', async () => {
    const transport = new FakeTransport()
      .reply(200, deviceReply())
      .reply(400, { error: 'authorization_pending' })
      .reply(200, { access_token: 'at-1', refresh_token: 'rt-1', token_type: 'bearer', expires_in: 3600 });
    const { poller, clock } = createPoller(transport);
    const prompt = vi.fn((_authorization: DeviceAuthorization) => undefined);

    const token = await poller.authorize(prompt);

    expect(token).toEqual({
      access_token: 'at-1',
      refresh_token: 'rt-1',
      token_type: 'bearer',
      expires_in: 3600,
      expires_at: 3610,
    });
    expect(poller.state).toBe('SUCCESS');
    expect(prompt).toHaveBeenCalledTimes(1);
    expect(prompt.mock.calls[0][0].user_code).toBe('ABCD-EFGH');
    expect(clock.sleeps).toEqual([5000, 5000]);
    expect(transport.calls[1]).toEqual({
      url: TOKEN_ENDPOINT,
      params: { client_id: 'test-client', device_code: 'dev-1', grant_type: DEVICE_CODE_GRANT },
    });
  });

  it('should treat an error body with status 200 as pending', async () => {
    const transport = new FakeTransport()
      .reply(200, deviceReply())
      .reply(200, { error: 'authorization_pending' })
      .reply(200, { access_token: 'at-1' });
    const { poller } = createPoller(transport);

    const token = await poller.authorize();
    expect(token.access_token).toBe('at-1');
    expect(transport.calls).toHaveLength(3);
  });

  it('should add 5 seconds per slow_down and stop at the deadline', async () => {
    const transport = new FakeTransport()
      .reply(200, deviceReply({ expires_in: 60 }))
      .reply(400, { error: 'slow_down' })
      .reply(400, { error: 'slow_down' })
      .reply(400, { error: 'slow_down' })
      .reply(400, { error: 'authorization_pending' });
    const { poller, clock } = createPoller(transport);

    await expect(poller.authorize()).rejects.toMatchObject({ type: 'device_code_expired' });

    expect(clock.sleeps).toEqual([5000, 10000, 15000, 20000, 20000]);
    expect(poller.interval).toBe(20);
    expect(poller.state).toBe('EXPIRED');
    // One device authorization request and four token polls
    expect(transport.calls).toHaveLength(5);
  });

  it('should end in DENIED on access_denied', async () => {
    const transport = new FakeTransport()
      .reply(200, deviceReply())
      .reply(400, { error: 'access_denied' });
    const { poller } = createPoller(transport);

    await expect(poller.authorize()).rejects.toMatchObject({ type: 'authorization_denied', code: 'access_denied' });
    expect(poller.state).toBe('DENIED');
  });

  it('should end in EXPIRED on expired_token', async () => {
    const transport = new FakeTransport()
      .reply(200, deviceReply())
      .reply(400, { error: 'expired_token' });
    const { poller } = createPoller(transport);

    await expect(poller.authorize()).rejects.toMatchObject({ type: 'device_code_expired' });
    expect(poller.state).toBe('EXPIRED');
  });

  it('should surface unknown errors verbatim', async () => {
    const transport = new FakeTransport()
      .reply(200, deviceReply())
      .reply(401, { error: 'invalid_client', error_description: 'Client unknown' });
    const { poller } = createPoller(transport);

    await expect(poller.authorize()).rejects.toMatchObject({
      type: 'protocol',
      code: 'invalid_client',
      description: 'Client unknown',
      message: 'OAuth error: invalid_client - Client unknown',
    });
    expect(poller.state).toBe('FATAL');
  });

  it('should fail when the device authorization request is rejected', async () => {
    const transport = new FakeTransport().reply(400, { error: 'invalid_scope' });
    const { poller } = createPoller(transport);

    await expect(poller.requestAuthorization()).rejects.toMatchObject({ type: 'protocol', code: 'invalid_scope' });
    expect(poller.state).toBe('FATAL');
  });

  it('should end in FATAL when the transport fails while polling', async () => {
    const transport = new FakeTransport()
      .reply(200, deviceReply())
      .fail(new Error('socket hang up'));
    const { poller } = createPoller(transport);

    await expect(poller.authorize()).rejects.toThrow('socket hang up');
    expect(poller.state).toBe('FATAL');
  });
});
