import { createApp, createAppContext } from '../../src/server';
import { MemoryStoreClient } from '../../src/storage/memory-store';
import { BackendError } from '../../src/domain/errors';
import { resetLogHandler, setLogHandler } from '../../src/logger';
import { errorOf, request } from './http';

/** A store whose object reads are throttled. */
class ThrottledStore extends MemoryStoreClient {
  async getObject(path: string): Promise<Buffer> {
    throw new BackendError(path, 429, 'slow down');
  }
}

describe('Log API', () => {
  beforeAll(() => {
    setLogHandler(() => undefined);
  });

  afterAll(() => {
    resetLogHandler();
  });

  it('stores and returns a log as text', async () => {
    const app = createApp(createAppContext());
    expect((await request(app, 'POST', '/log/churn/u1', 'step 1\nstep 2\n')).status).toBe(200);

    const res = await request(app, 'GET', '/log/churn/u1');
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toMatch(/^text\/plain/);
    expect(res.text).toBe('step 1\nstep 2\n');
  });

  it('returns 404 for a missing log', async () => {
    const app = createApp(createAppContext());
    const res = await request(app, 'GET', '/log/churn/none');
    expect(res.status).toBe(404);
    expect(errorOf(res).message).toBe('Path not found: /log/churn-none');
  });

  it('passes the backend status through', async () => {
    const ctx = createAppContext(new ThrottledStore());
    expect(ctx.storeKind).toBe('custom');

    const res = await request(createApp(ctx), 'GET', '/log/churn/u1');
    expect(res.status).toBe(429);
    expect(errorOf(res)).toEqual({ code: 'STORE.BACKEND', message: 'slow down' });
  });
});
