/**
 * Admin Config API Tests
 * Knobs take effect on the next quote, without a restart
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../src/app.js';
import { InMemoryKnobsStore } from '../src/infra/knobs/in-memory-knobs.store.js';

const ADMIN_KEY = 'test-admin';

const QUOTE_BODY = {
  quantity: 1,
  material: '304',
  thickness: 0.25,
  handleWidth: 2,
  handleLengthFromBore: 18,
  paddleDia: 6,
  boreDia: 2,
  boreTolerance: 0.005,
  chamfer: true,
  shipsInDays: 7
};

describe('Admin Config API', () => {
  let app: Express;
  let store: InMemoryKnobsStore;

  beforeEach(() => {
    store = new InMemoryKnobsStore(() => new Date('2026-03-01T00:00:00.000Z'));
    app = createApp({ store, apiKey: '', adminApiKey: ADMIN_KEY });
  });

  it('requires the admin key', async () => {
    const response = await request(app).get('/api/v1/admin/config');

    assert.equal(response.status, 401);
    assert.equal(response.body.code, 'INVALID_API_KEY');
  });

  it('GET /config shows no override on a fresh server', async () => {
    const response = await request(app)
      .get('/api/v1/admin/config')
      .set('x-api-key', ADMIN_KEY);

    assert.equal(response.status, 200);
    assert.equal(response.body.active, null);
    assert.equal(response.body.effective.version, 'baseline-2025.1');
  });

  it('PUT /config with a preset disables rush orders for the next quote', async () => {
    const before = await request(app).post('/api/v1/quote').send(QUOTE_BODY);
    assert.equal(before.status, 200);
    assert.equal(before.body.unitPrice, 542.91);

    const put = await request(app)
      .put('/api/v1/admin/config')
      .set('x-api-key', ADMIN_KEY)
      .set('x-admin-user', 'ops-lead')
      .send({ leadTimePreset: 'no_rush' });

    assert.equal(put.status, 200);
    assert.equal(put.body.ok, true);
    assert.deepEqual(put.body.config, {
      override: { leadTimeEnabled: { '7': false, '14': true, '21': true } },
      updatedAt: '2026-03-01T00:00:00.000Z',
      updatedBy: 'ops-lead'
    });

    const after = await request(app).post('/api/v1/quote').send(QUOTE_BODY);
    assert.equal(after.status, 422);
    assert.deepEqual(after.body.issues, [{ field: 'shipsInDays', reason: 'unsupported shipsInDays: 7' }]);
  });

  it('labels the effective version with the override time', async () => {
    await request(app)
      .put('/api/v1/admin/config')
      .set('x-api-key', ADMIN_KEY)
      .send({ process: { laborPerHr: 120 } });

    const quote = await request(app).post('/api/v1/quote').send({ ...QUOTE_BODY, shipsInDays: 21 });
    assert.equal(quote.body.configVersion, 'baseline-2025.1+override@2026-03-01T00:00:00.000Z');
  });

  it('defaults updatedBy to admin', async () => {
    const response = await request(app)
      .put('/api/v1/admin/config')
      .set('x-api-key', ADMIN_KEY)
      .send({ version: 'promo-1' });

    assert.equal(response.body.config.updatedBy, 'admin');
  });

  it('PUT /config rejects an undecodable body', async () => {
    const response = await request(app)
      .put('/api/v1/admin/config')
      .set('x-api-key', ADMIN_KEY)
      .send({ pricePerSqIn: { '304': { quarter: 0.3 } } });

    assert.equal(response.status, 400);
    assert.equal(response.body.error, 'INVALID_CONFIG');
    assert.equal(response.body.message, 'pricePerSqIn.304.quarter: key "quarter" is not a number');
    assert.equal(await store.getActive(), null);
  });

  it('PUT /config rejects knobs that cannot price anything', async () => {
    const response = await request(app)
      .put('/api/v1/admin/config')
      .set('x-api-key', ADMIN_KEY)
      .send({ leadTimeEnabled: { '7': false, '14': false, '21': false } });

    assert.equal(response.status, 400);
    assert.equal(response.body.error, 'INCONSISTENT_CONFIG');
    assert.equal(response.body.message, 'no lead time is enabled');
    assert.equal(await store.getActive(), null);
  });

  it('PUT /config rejects knobs that disable the default lead time', async () => {
    const response = await request(app)
      .put('/api/v1/admin/config')
      .set('x-api-key', ADMIN_KEY)
      .send({ leadTimePreset: 'rush_only' });

    assert.equal(response.status, 400);
    assert.equal(response.body.error, 'INCONSISTENT_CONFIG');
    assert.equal(response.body.message, 'default lead time 21 days is not enabled');
    assert.equal(await store.getActive(), null);
  });

  it('PUT /config accepts rush-only once the default moves with it', async () => {
    const put = await request(app)
      .put('/api/v1/admin/config')
      .set('x-api-key', ADMIN_KEY)
      .send({ leadTimePreset: 'rush_only', defaultLeadTimeDays: 7 });

    assert.equal(put.status, 200);

    const { shipsInDays: _omitted, ...body } = QUOTE_BODY;
    const quote = await request(app).post('/api/v1/quote').send(body);
    assert.equal(quote.status, 200);
    assert.equal(quote.body.shipsInDays, 7);
  });

  it('POST /config/reset goes back to the baseline', async () => {
    await request(app)
      .put('/api/v1/admin/config')
      .set('x-api-key', ADMIN_KEY)
      .send({ leadTimePreset: 'no_rush' });

    const reset = await request(app)
      .post('/api/v1/admin/config/reset')
      .set('x-api-key', ADMIN_KEY);

    assert.equal(reset.status, 200);
    assert.equal(reset.body.effective.version, 'baseline-2025.1');

    const quote = await request(app).post('/api/v1/quote').send(QUOTE_BODY);
    assert.equal(quote.status, 200);
    assert.equal(quote.body.leadTimeMultiplier, 2.3);
  });
});
