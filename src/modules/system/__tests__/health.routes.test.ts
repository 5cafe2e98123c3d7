import { createApp } from '../../../app.js';
import { config } from '../../../config/env.js';
import { InMemoryPlaceRepository } from '../../catalog/places/place.repository.js';

describe('system routes', () => {
  let app: Awaited<ReturnType<typeof createApp>>;

  beforeAll(async () => {
    app = await createApp({ placeRepository: new InMemoryPlaceRepository([]), categories: [{ slug: 'tag.outdoor', type: 'TAG', name: 'Outdoor' }] });
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /health reports ok and the catalog source', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      status: 'ok',
      env: 'test',
      catalog: { places: 'injected', categories: 1 },
    });
  });

  it('GET /version returns the configured version', async () => {
    const res = await app.inject({ method: 'GET', url: '/version' });
    expect(res.json()).toEqual({ version: config.SWAGGER_VERSION });
  });
});
