import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import axios from 'axios';
import { deferred, flushPromises } from '../../test/fakes/async';
import { FakeHttpBackend, FakeReply, RecordedCall } from '../../test/fakes/fake-http-backend';
import { CREDENTIAL_STORE } from '../credentials/credential-store.types';
import { InMemoryCredentialStore } from '../credentials/in-memory-credential.store';
import { ApiError, ApiErrorType, SessionInvalidError } from './api-error';
import { RequestPipelineService } from './request-pipeline.service';
import { HTTP_CLIENT } from './request.types';
import { TokenRefreshService } from './token-refresh.service';

/** 200 for the refreshed token, 401 for anything else. */
function acceptsOnly(token: string, data: unknown) {
  return (call: RecordedCall): FakeReply =>
    call.authorization === `Bearer ${token}`
      ? { status: 200, data }
      : { status: 401, data: { error: 'token expired' } };
}

describe('RequestPipelineService', () => {
  let moduleRef: TestingModule;
  let pipeline: RequestPipelineService;
  let backend: FakeHttpBackend;
  let store: InMemoryCredentialStore;

  beforeEach(async () => {
    backend = new FakeHttpBackend();
    store = new InMemoryCredentialStore();
    store.seed('old-access', 'test-refresh');

    moduleRef = await Test.createTestingModule({
      providers: [
        RequestPipelineService,
        TokenRefreshService,
        {
          provide: HTTP_CLIENT,
          useValue: axios.create({ baseURL: 'http://api.test', adapter: backend.adapter }),
        },
        { provide: CREDENTIAL_STORE, useValue: store },
        { provide: ConfigService, useValue: new ConfigService({ AUTH_REFRESH_PATH: '/auth/refresh' }) },
      ],
    }).compile();

    pipeline = moduleRef.get(RequestPipelineService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('happy path', () => {
    it('attaches the stored access token', async () => {
      backend.on('GET', '/orders', () => ({ status: 200, data: [{ id: 'o-1' }] }));

      const res = await pipeline.get<{ id: string }[]>('/orders');

      expect(res.data).toEqual([{ id: 'o-1' }]);
      expect(backend.calls).toHaveLength(1);
      expect(backend.calls[0].authorization).toBe('Bearer old-access');
    });

    it('sends no Authorization header without a stored token', async () => {
      await store.clear();
      backend.on('GET', '/public/menu', () => ({ status: 200, data: [] }));

      await pipeline.get('/public/menu');

      expect(backend.calls[0].authorization).toBeNull();
    });

    it('passes method, query and body through', async () => {
      backend.on('POST', '/orders', () => ({ status: 201, data: { id: 'o-9' } }));

      const res = await pipeline.post('/orders', { item: 'espresso', qty: 2 }, { query: { location: 'loc-1' } });

      expect(res.status).toBe(201);
      expect(backend.calls[0]).toEqual({
        method: 'POST',
        url: '/orders',
        authorization: 'Bearer old-access',
        params: { location: 'loc-1' },
        body: { item: 'espresso', qty: 2 },
      });
    });

    it('routes every verb helper through execute', async () => {
      backend
        .on('PUT', '/orders/o-1', () => ({ status: 200, data: 'put' }))
        .on('PATCH', '/orders/o-1', () => ({ status: 200, data: 'patch' }))
        .on('DELETE', '/orders/o-1', () => ({ status: 204 }));

      expect((await pipeline.put('/orders/o-1', { qty: 1 })).data).toBe('put');
      expect((await pipeline.patch('/orders/o-1', { qty: 2 })).data).toBe('patch');
      expect((await pipeline.delete('/orders/o-1')).status).toBe(204);
      expect(backend.calls.map((c) => c.method)).toEqual(['PUT', 'PATCH', 'DELETE']);
    });
  });

  describe('authorization failure', () => {
    it('refreshes once for concurrent 401s and retries each call with the new token', async () => {
      const gate = deferred();
      backend
        .on('GET', '/orders', acceptsOnly('new-access', ['o-1']))
        .on('GET', '/inventory', acceptsOnly('new-access', ['i-1']))
        .on('POST', '/auth/refresh', async () => {
          await gate.promise;
          return { status: 200, data: { access_token: 'new-access' } };
        });

      let settled = false;
      const all = Promise.all([
        pipeline.get('/orders'),
        pipeline.get('/orders'),
        pipeline.get('/inventory'),
      ]).finally(() => {
        settled = true;
      });

      await flushPromises();
      await flushPromises();
      expect(backend.callsTo('POST', '/auth/refresh')).toHaveLength(1);
      expect(settled).toBe(false);

      gate.resolve();
      const responses = await all;

      expect(responses.map((r) => r.data)).toEqual([['o-1'], ['o-1'], ['i-1']]);
      expect(backend.callsTo('POST', '/auth/refresh')).toHaveLength(1);
      const retried = backend.calls.filter((c) => c.authorization === 'Bearer new-access');
      expect(retried).toHaveLength(3);
      expect(await store.getAccessToken()).toBe('new-access');
    });

    it('calls the refresh endpoint with the refresh token and no bearer token', async () => {
      backend
        .on('GET', '/orders', acceptsOnly('new-access', []))
        .on('POST', '/auth/refresh', () => ({ status: 200, data: { access_token: 'new-access' } }));

      await pipeline.get('/orders');

      const [refresh] = backend.callsTo('POST', '/auth/refresh');
      expect(refresh.authorization).toBeNull();
      expect(refresh.body).toEqual({ refresh_token: 'test-refresh' });
    });

    it('stores a rotated refresh token', async () => {
      backend
        .on('GET', '/orders', acceptsOnly('new-access', []))
        .on('POST', '/auth/refresh', () => ({
          status: 200,
          data: { access_token: 'new-access', refresh_token: 'new-refresh' },
        }));

      await pipeline.get('/orders');

      expect(await store.getRefreshToken()).toBe('new-refresh');
    });

    it('surfaces a failing retry without a second refresh', async () => {
      backend
        .on('GET', '/orders', () => ({ status: 401, data: { error: 'still expired' } }))
        .on('POST', '/auth/refresh', () => ({ status: 200, data: { access_token: 'new-access' } }));

      const err = await pipeline.get('/orders').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ApiError);
      expect(err).toMatchObject({ type: ApiErrorType.Unauthorized, statusCode: 401, message: 'still expired' });
      expect(backend.callsTo('POST', '/auth/refresh')).toHaveLength(1);
      expect(backend.callsTo('GET', '/orders').map((c) => c.authorization)).toEqual([
        'Bearer old-access',
        'Bearer new-access',
      ]);
    });

    it('surfaces the retry failure classified when it is not a 401', async () => {
      backend
        .on('GET', '/orders', (call) =>
          call.authorization === 'Bearer new-access'
            ? { status: 403, data: { message: 'wrong location' } }
            : { status: 401 },
        )
        .on('POST', '/auth/refresh', () => ({ status: 200, data: { access_token: 'new-access' } }));

      await expect(pipeline.get('/orders')).rejects.toMatchObject({
        type: ApiErrorType.Forbidden,
        statusCode: 403,
        message: 'wrong location',
      });
    });

    it('rejects every waiter with a session error and clears credentials once when the refresh fails', async () => {
      const clear = jest.spyOn(store, 'clear');
      const gate = deferred();
      backend
        .on('GET', '/orders', () => ({ status: 401 }))
        .on('POST', '/auth/refresh', async () => {
          await gate.promise;
          return { status: 401, data: { error: 'refresh token revoked' } };
        });

      const all = Promise.allSettled([
        pipeline.get('/orders'),
        pipeline.get('/orders'),
        pipeline.get('/orders'),
      ]);
      await flushPromises();
      await flushPromises();
      gate.resolve();
      const results = await all;

      for (const result of results) {
        expect(result.status).toBe('rejected');
        if (result.status === 'rejected') {
          expect(result.reason).toBeInstanceOf(SessionInvalidError);
          expect(result.reason).toMatchObject({ type: ApiErrorType.SessionInvalid });
        }
      }
      expect(clear).toHaveBeenCalledTimes(1);
      expect(backend.callsTo('POST', '/auth/refresh')).toHaveLength(1);
      expect(backend.callsTo('GET', '/orders')).toHaveLength(3);
      expect(await store.getAccessToken()).toBeNull();
      expect(await store.getRefreshToken()).toBeNull();
    });

    it('fails a 401 arriving after a failed refresh without clearing credentials again', async () => {
      const clear = jest.spyOn(store, 'clear');
      const gate = deferred();
      backend
        .on('GET', '/orders', () => ({ status: 401 }))
        .on('GET', '/inventory', async () => {
          await gate.promise;
          return { status: 401 };
        })
        .on('POST', '/auth/refresh', () => ({ status: 401, data: { error: 'refresh token revoked' } }));

      const late = pipeline.get('/inventory').catch((e: unknown) => e);
      await expect(pipeline.get('/orders')).rejects.toBeInstanceOf(SessionInvalidError);
      expect(clear).toHaveBeenCalledTimes(1);

      gate.resolve();
      const err = await late;

      expect(err).toBeInstanceOf(SessionInvalidError);
      expect(err).toMatchObject({ message: 'Session is no longer valid: session already invalidated' });
      expect(clear).toHaveBeenCalledTimes(1);
      expect(backend.callsTo('POST', '/auth/refresh')).toHaveLength(1);
      expect(backend.callsTo('GET', '/inventory')).toHaveLength(1);
    });

    it('treats a missing refresh token as an invalid session', async () => {
      store.seed('old-access', null);
      const clear = jest.spyOn(store, 'clear');
      backend.on('GET', '/orders', () => ({ status: 401 }));

      await expect(pipeline.get('/orders')).rejects.toBeInstanceOf(SessionInvalidError);
      expect(backend.callsTo('POST', '/auth/refresh')).toHaveLength(0);
      expect(clear).toHaveBeenCalledTimes(1);
    });

    it('treats a refresh response without an access token as an invalid session', async () => {
      backend
        .on('GET', '/orders', () => ({ status: 401 }))
        .on('POST', '/auth/refresh', () => ({ status: 200, data: { message: 'ok' } }));

      await expect(pipeline.get('/orders')).rejects.toBeInstanceOf(SessionInvalidError);
      expect(backend.callsTo('GET', '/orders')).toHaveLength(1);
    });

    it('treats a refresh network failure as an invalid session', async () => {
      backend
        .on('GET', '/orders', () => ({ status: 401 }))
        .on('POST', '/auth/refresh', () => ({ errorCode: 'ERR_NETWORK', message: 'Network Error' }));

      await expect(pipeline.get('/orders')).rejects.toBeInstanceOf(SessionInvalidError);
      expect(await store.getAccessToken()).toBeNull();
    });
  });

  describe('other failures', () => {
    it.each([
      { status: 400, type: ApiErrorType.BadRequest },
      { status: 403, type: ApiErrorType.Forbidden },
      { status: 404, type: ApiErrorType.NotFound },
      { status: 409, type: ApiErrorType.BadRequest },
      { status: 422, type: ApiErrorType.ValidationError },
      { status: 500, type: ApiErrorType.ServerError },
      { status: 503, type: ApiErrorType.ServerError },
    ])('classifies status $status as $type without retrying', async ({ status, type }) => {
      backend.on('GET', '/orders', () => ({ status, data: { detail: 'nope' } }));

      await expect(pipeline.get('/orders')).rejects.toMatchObject({ type, statusCode: status, message: 'nope' });
      expect(backend.calls).toHaveLength(1);
    });

    it('reports a network failure as no_connection', async () => {
      backend.on('GET', '/orders', () => ({ errorCode: 'ERR_NETWORK', message: 'Network Error' }));

      const err = await pipeline.get('/orders').catch((e: unknown) => e);

      expect(err).toMatchObject({ type: ApiErrorType.NoConnection, message: 'Unable to reach the server' });
      expect(err).toHaveProperty('statusCode', undefined);
      expect(backend.calls).toHaveLength(1);
    });

    it('reports a timeout as timeout', async () => {
      backend.on('GET', '/orders', () => ({ errorCode: 'ECONNABORTED', message: 'timeout of 30000ms exceeded' }));

      await expect(pipeline.get('/orders')).rejects.toMatchObject({ type: ApiErrorType.Timeout });
    });

    it('reports an aborted request as cancelled', async () => {
      backend.on('GET', '/orders', () => ({ status: 200, data: [] }));
      const controller = new AbortController();
      controller.abort();

      await expect(pipeline.get('/orders', { signal: controller.signal })).rejects.toMatchObject({
        type: ApiErrorType.Cancelled,
      });
      expect(backend.calls).toHaveLength(0);
    });
  });
});
