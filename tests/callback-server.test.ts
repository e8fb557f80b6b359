import { describe, it, expect, afterEach } from 'vitest';
import request from 'supertest';
import fc from 'fast-check';
import { CallbackServer, decodeQueryComponent, parseQueryParams } from '../src/auth/callback-server.js';
import { escapeHtml, getErrorHTML } from '../src/auth/callback-page.js';

describe('query decoding', () => {
  it('should decode percent escapes and plus signs', () => {
    expect(decodeQueryComponent('a+b%20c')).toBe('a b c');
    expect(decodeQueryComponent('%E2%9C%93')).toBe('✓');
    expect(decodeQueryComponent('c%2F1')).toBe('c/1');
  });

  it('should keep malformed escapes literally', () => {
    expect(decodeQueryComponent('100%')).toBe('100%');
    expect(decodeQueryComponent('%zz')).toBe('%zz');
    expect(decodeQueryComponent('%4')).toBe('%4');
  });

  it('should split a query into parameters', () => {
    const params = parseQueryParams('code=abc&state=xyz&&flag');
    expect([...params.entries()]).toEqual([
      ['code', 'abc'],
      ['state', 'xyz'],
      ['flag', ''],
    ]);
  });

  it('should round-trip values encoded with encodeURIComponent', () => {
    fc.assert(
      fc.property(fc.string(), (value) => {
        expect(decodeQueryComponent(encodeURIComponent(value))).toBe(value);
      }),
      { numRuns: 100 }
    );
  });
});

describe('callback pages', () => {
  it('should escape messages on the error page', () => {
    expect(escapeHtml('<script>"x" & \'y\'</script>'))
      .toBe('&lt;script&gt;&quot;x&quot; &amp; &#39;y&#39;&lt;/script&gt;');
    expect(getErrorHTML('<b>bad</b>')).toContain('&lt;b&gt;bad&lt;/b&gt;');
  });
});

describe('CallbackServer', () => {
  let server: CallbackServer;

  afterEach(async () => {
    await server.close();
  });

  describe('request handling', () => {
    it('should answer a callback without query with 400', async () => {
      server = new CallbackServer();
      const response = await request(server.getApp()).get('/callback');

      expect(response.status).toBe(400);
      expect(response.text).toContain('Missing query parameters');
    });

    it('should answer other paths with 404', async () => {
      server = new CallbackServer();
      const response = await request(server.getApp()).get('/favicon.ico');

      expect(response.status).toBe(404);
      expect(response.text).toContain('Not Found');
    });

    it('should show the success page once, then refuse further callbacks', async () => {
      server = new CallbackServer();
      const app = server.getApp();

      const first = await request(app).get('/callback?code=abc&state=xyz');
      expect(first.status).toBe(200);
      expect(first.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(first.text).toContain('Authorization Successful');

      const second = await request(app).get('/callback?code=def&state=xyz');
      expect(second.status).toBe(400);
      expect(second.text).toContain('This authorization attempt has already completed.');
    });

    it('should show the server error on an error redirect', async () => {
      server = new CallbackServer();
      const response = await request(server.getApp())
        .get('/callback?error=access_denied&error_description=User+said+no');

      expect(response.status).toBe(400);
      expect(response.text).toContain('Authorization failed: access_denied');
    });

    it('should name the missing field', async () => {
      server = new CallbackServer();
      const response = await request(server.getApp()).get('/callback?code=abc');

      expect(response.status).toBe(400);
      expect(response.text).toContain('Missing required field: state');
    });
  });

  describe('waitForCallback', () => {
    it('should resolve with the decoded code and state', async () => {
      server = new CallbackServer();
      await server.start();
      expect(server.redirectUri).toBe(`http://127.0.0.1:${server.port}/callback`);

      const wait = server.waitForCallback(5000);
      const [response, result] = await Promise.all([
        request(`http://127.0.0.1:${server.port}`).get('/callback?code=c%2F1&state=s+1'),
        wait,
      ]);

      expect(response.status).toBe(200);
      expect(result).toEqual({ code: 'c/1', state: 's 1' });
    });

    it('should keep listening after a request without query', async () => {
      server = new CallbackServer();
      await server.start();
      const base = `http://127.0.0.1:${server.port}`;
      const wait = server.waitForCallback(5000);

      const empty = await request(base).get('/callback');
      expect(empty.status).toBe(400);

      const [response, result] = await Promise.all([
        request(base).get('/callback?code=abc&state=xyz'),
        wait,
      ]);
      expect(response.status).toBe(200);
      expect(result).toEqual({ code: 'abc', state: 'xyz' });
    });

    it('should reject with the server error from an error redirect', async () => {
      server = new CallbackServer();
      await server.start();
      const outcome = expect(server.waitForCallback(5000)).rejects.toMatchObject({
        type: 'protocol',
        code: 'access_denied',
        description: 'User said no',
      });

      const response = await request(`http://127.0.0.1:${server.port}`)
        .get('/callback?error=access_denied&error_description=User+said+no');
      expect(response.status).toBe(400);
      await outcome;
    });

    it('should reject with missing_field when state is absent', async () => {
      server = new CallbackServer();
      await server.start();
      const outcome = expect(server.waitForCallback(5000)).rejects.toMatchObject({
        type: 'missing_field',
        field: 'state',
      });

      await request(`http://127.0.0.1:${server.port}`).get('/callback?code=abc');
      await outcome;
    });

    it('should time out and refuse to be reused', async () => {
      server = new CallbackServer();

      await expect(server.waitForCallback(50)).rejects.toMatchObject({
        type: 'timeout',
        message: 'Callback not received in time',
      });
      await expect(server.waitForCallback(50)).rejects.toMatchObject({ type: 'config' });
    });
  });
});
