import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { buffer } from 'stream/consumers';
import { HttpClientService } from '../../../src/shared/http/http-client.service';
import { createTestLogger } from '../helpers/mock-factories';
import {
  LocalHttpServer,
  redirectTo,
  respondWith,
  startLocalHttpServer,
  streamChunks,
} from '../helpers/local-http-server';

describe('HttpClientService', () => {
  let httpClient: HttpClientService;

  beforeEach(() => {
    httpClient = new HttpClientService(createTestLogger());
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await httpClient.destroy();
  });

  describe('postForm', () => {
    it('should encode fields and merge caller headers', async () => {
      const requestSpy = vi.spyOn(httpClient, 'request').mockResolvedValue({
        statusCode: 200,
        headers: {},
        body: '',
      });

      await httpClient.postForm(
        'https://api.example.com/form',
        { name: 'A B', email: 'a@b.c' },
        { headers: { Authorization: 'Basic dGVzdA==' } },
      );

      expect(requestSpy).toHaveBeenCalledWith('https://api.example.com/form', {
        method: 'POST',
        body: 'name=A+B&email=a%40b.c',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Authorization: 'Basic dGVzdA==',
        },
      });
    });
  });

  describe('request', () => {
    let server: LocalHttpServer;

    beforeEach(async () => {
      server = await startLocalHttpServer({
        '/json': respondWith(200, '{"id":"<1@mg>"}'),
        '/text': respondWith(401, 'Forbidden'),
      });
    });

    afterEach(async () => {
      await server.close();
    });

    it('should parse a JSON body', async () => {
      const response = await httpClient.request(server.url('/json'));

      expect(response).toMatchObject({ statusCode: 200, body: { id: '<1@mg>' } });
    });

    it('should return a non-JSON body as text', async () => {
      const response = await httpClient.request(server.url('/text'));

      expect(response).toMatchObject({ statusCode: 401, body: 'Forbidden' });
    });

    it('should reject a URL that cannot be parsed', async () => {
      await expect(httpClient.request('::invalid')).rejects.toThrow(TypeError);
    });
  });

  describe('downloadToStream', () => {
    let server: LocalHttpServer;
    const archive = Buffer.alloc(1024, 5);

    beforeEach(async () => {
      server = await startLocalHttpServer({
        '/real/a.zip': respondWith(200, archive),
        '/dl/a.zip': redirectTo('/real/a.zip'),
        '/hop/a.zip': redirectTo('/dl/a.zip', 301),
        '/loop/a.zip': redirectTo('/loop/a.zip'),
        '/chunked/a.zip': streamChunks([Buffer.alloc(10000, 1), Buffer.alloc(5000, 2)]),
      });
    });

    afterEach(async () => {
      await server.close();
    });

    it('should stream the body of a 200 reply', async () => {
      const response = await httpClient.downloadToStream(server.url('/real/a.zip'));

      expect(response.statusCode).toBe(200);
      expect((await buffer(response.body)).equals(archive)).toBe(true);
    });

    it('should stream a chunked body in full', async () => {
      const response = await httpClient.downloadToStream(server.url('/chunked/a.zip'));

      expect((await buffer(response.body)).length).toBe(15000);
    });

    it('should follow redirects', async () => {
      const response = await httpClient.downloadToStream(server.url('/hop/a.zip'));

      expect(response.statusCode).toBe(200);
      expect((await buffer(response.body)).equals(archive)).toBe(true);
    });

    it('should hand back the redirect once the limit is reached', async () => {
      const response = await httpClient.downloadToStream(server.url('/loop/a.zip'), {
        maxRedirections: 2,
      });

      expect(response.statusCode).toBe(302);
      await buffer(response.body);
    });

    it('should hand back a 404 with its body unread', async () => {
      const response = await httpClient.downloadToStream(server.url('/missing.zip'));

      expect(response.statusCode).toBe(404);
      expect((await buffer(response.body)).toString()).toBe('Not Found');
    });

    it('should release the connection once the body has been read', async () => {
      const response = await httpClient.downloadToStream(server.url('/real/a.zip'));
      await buffer(response.body);

      await vi.waitFor(async () => {
        expect(await server.connectionCount()).toBe(0);
      });
    });

    it('should reject a URL that cannot be parsed', async () => {
      await expect(httpClient.downloadToStream('not a url.zip')).rejects.toThrow(TypeError);
    });
  });
});
