/**
 * Quote API Tests
 * POST /api/v1/quote, POST /api/v1/quote/cart, GET /api/v1/config/active
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../src/app.js';
import { InMemoryKnobsStore } from '../src/infra/knobs/in-memory-knobs.store.js';

const REFERENCE_BODY = {
  quantity: 1,
  material: '304',
  thickness: 0.25,
  handleWidth: 2,
  handleLengthFromBore: 18,
  paddleDia: 6,
  boreDia: 2,
  boreTolerance: 0.005,
  chamfer: true,
  shipsInDays: 21
};

describe('Quote API', () => {
  let app: Express;
  let store: InMemoryKnobsStore;

  beforeEach(() => {
    store = new InMemoryKnobsStore();
    app = createApp({ store, apiKey: '', adminApiKey: '' });
  });

  describe('POST /api/v1/quote', () => {
    it('returns the reference quote', async () => {
      const response = await request(app).post('/api/v1/quote').send(REFERENCE_BODY);

      assert.equal(response.status, 200);
      assert.equal(response.body.unitPrice, 236.05);
      assert.equal(response.body.totalPriceCents, 23605);
      assert.equal(response.body.chamferWidth, 0.062);
      assert.equal(response.body.handleLabel, 'No label');
      assert.equal(response.body.configVersion, 'baseline-2025.1');
      assert.deepEqual(response.body.shippingRates, {
        groundCents: 1800,
        twoDayCents: 3330,
        overnightCents: 5130
      });
    });

    it('echoes the caller trace id', async () => {
      const response = await request(app)
        .post('/api/v1/quote')
        .set('x-trace-id', 'trace-123')
        .send(REFERENCE_BODY);

      assert.equal(response.headers['x-trace-id'], 'trace-123');
    });

    it('falls back to the default lead time', async () => {
      const { shipsInDays: _omitted, ...body } = REFERENCE_BODY;
      const response = await request(app).post('/api/v1/quote').send(body);

      assert.equal(response.status, 200);
      assert.equal(response.body.shipsInDays, 21);
      assert.equal(response.body.leadTimeMultiplier, 1);
    });

    it('returns 422 with field-level issues', async () => {
      const response = await request(app)
        .post('/api/v1/quote')
        .set('x-trace-id', 'trace-422')
        .send({ ...REFERENCE_BODY, boreDia: 6 });

      assert.equal(response.status, 422);
      assert.equal(response.body.error, 'VALIDATION_ERROR');
      assert.equal(response.body.traceId, 'trace-422');
      assert.deepEqual(response.body.issues, [{
        field: 'boreDia',
        reason: 'boreDia must be smaller than paddleDia',
        relatedFields: ['paddleDia']
      }]);
    });

    it('returns 422 for a disabled material', async () => {
      const response = await request(app).post('/api/v1/quote').send({ ...REFERENCE_BODY, material: 'Monel' });

      assert.equal(response.status, 422);
      assert.equal(response.body.issues[0].field, 'material');
    });

    it('returns 500 CONFIGURATION_ERROR when nothing can be priced', async () => {
      await store.save({ materialEnabled: { '304': false, '316': false, 'Carbon Steel': false } }, 'test');

      const response = await request(app).post('/api/v1/quote').send(REFERENCE_BODY);

      assert.equal(response.status, 500);
      assert.equal(response.body.error, 'CONFIGURATION_ERROR');
      assert.equal(response.body.reason, 'effective price table is empty: no enabled material/thickness has a price');
    });

    it('returns 422 for a quantity beyond safe integer range', async () => {
      const response = await request(app).post('/api/v1/quote').send({ ...REFERENCE_BODY, quantity: 1e308 });

      assert.equal(response.status, 422);
      assert.deepEqual(response.body.issues, [{ field: 'quantity', reason: 'quantity must be a safe integer >= 1' }]);
    });

    it('returns 422 for an oversized handle', async () => {
      const response = await request(app)
        .post('/api/v1/quote')
        .send({ ...REFERENCE_BODY, handleLengthFromBore: 1e308, handleWidth: 1e308 });

      assert.equal(response.status, 422);
      assert.deepEqual(response.body.issues, [
        { field: 'handleLengthFromBore', reason: 'handleLengthFromBore must be <= 120' },
        { field: 'handleWidth', reason: 'handleWidth must be <= 48' }
      ]);
    });

    it('returns 422 for 11ga plate on the default knobs', async () => {
      const response = await request(app).post('/api/v1/quote').send({ ...REFERENCE_BODY, thickness: 0.12 });

      assert.equal(response.status, 422);
      assert.deepEqual(response.body.issues, [
        { field: 'thickness', reason: 'no price for thickness 0.12 in material 304' }
      ]);
    });

    it('returns 400 on malformed JSON', async () => {
      const response = await request(app)
        .post('/api/v1/quote')
        .set('Content-Type', 'application/json')
        .send('{"quantity":');

      assert.equal(response.status, 400);
      assert.equal(response.body.error, 'BAD_REQUEST');
    });

    it('is also served on the legacy path', async () => {
      const response = await request(app).post('/api/quote').send(REFERENCE_BODY);

      assert.equal(response.status, 200);
      assert.equal(response.body.totalPriceCents, 23605);
    });
  });

  describe('API key', () => {
    beforeEach(() => {
      app = createApp({ store, apiKey: 'test-key', adminApiKey: 'test-admin' });
    });

    it('rejects a request without the key', async () => {
      const response = await request(app).post('/api/v1/quote').send(REFERENCE_BODY);

      assert.equal(response.status, 401);
      assert.equal(response.body.code, 'INVALID_API_KEY');
    });

    it('rejects a wrong key', async () => {
      const response = await request(app)
        .post('/api/v1/quote')
        .set('x-api-key', 'wrong-key')
        .send(REFERENCE_BODY);

      assert.equal(response.status, 401);
    });

    it('accepts the configured key', async () => {
      const response = await request(app)
        .post('/api/v1/quote')
        .set('x-api-key', 'test-key')
        .send(REFERENCE_BODY);

      assert.equal(response.status, 200);
    });

    it('leaves the availability endpoint open', async () => {
      const response = await request(app).get('/api/v1/config/active');
      assert.equal(response.status, 200);
    });
  });

  describe('POST /api/v1/quote/cart', () => {
    it('sums the lines', async () => {
      const response = await request(app)
        .post('/api/v1/quote/cart')
        .send({ items: [REFERENCE_BODY, REFERENCE_BODY] });

      assert.equal(response.status, 200);
      assert.equal(response.body.items.length, 2);
      assert.deepEqual(response.body.summary, {
        lineCount: 2,
        totalQuantity: 2,
        itemsTotalCents: 47210,
        shippingCents: { groundCents: 3600, twoDayCents: 6660, overnightCents: 10260 },
        estimatedTotalWeightLb: 19.3
      });
    });

    it('rejects an empty cart', async () => {
      const response = await request(app).post('/api/v1/quote/cart').send({ items: [] });

      assert.equal(response.status, 422);
      assert.deepEqual(response.body.issues, [{ field: 'items', reason: 'Cart is empty' }]);
    });

    it('prefixes item issues with the line index', async () => {
      const response = await request(app)
        .post('/api/v1/quote/cart')
        .send({ items: [REFERENCE_BODY, { ...REFERENCE_BODY, boreDia: 7 }] });

      assert.equal(response.status, 422);
      assert.deepEqual(response.body.issues, [{
        field: 'items.1.boreDia',
        reason: 'boreDia must be smaller than paddleDia',
        relatedFields: ['items.1.paddleDia']
      }]);
    });

    it('rejects a body without items', async () => {
      const response = await request(app).post('/api/v1/quote/cart').send({});

      assert.equal(response.status, 422);
      assert.equal(response.body.issues[0].field, 'items');
    });
  });

  describe('GET /api/v1/config/active', () => {
    it('lists what can be ordered', async () => {
      const response = await request(app).get('/api/v1/config/active');

      assert.equal(response.status, 200);
      assert.deepEqual(response.body.materials, {
        '304': [0.25, 0.375, 0.5],
        '316': [0.25, 0.375, 0.5],
        'Carbon Steel': [0.25, 0.375, 0.5]
      });
      assert.deepEqual(response.body.leadTimes, [
        { days: 7, multiplier: 2.3 },
        { days: 14, multiplier: 1.6 },
        { days: 21, multiplier: 1 }
      ]);
      assert.deepEqual(response.body.boreTolerances, [0.001, 0.002, 0.005]);
      assert.equal(response.body.defaultLeadTimeDays, 21);
      assert.equal(response.body.maxPaddleDiaIn, 48);
    });
  });

  describe('Health', () => {
    it('GET /healthz returns ok', async () => {
      const response = await request(app).get('/healthz');
      assert.equal(response.status, 200);
      assert.equal(response.text, 'ok');
    });

    it('GET /api/v1/health reports the config version', async () => {
      const response = await request(app).get('/api/v1/health');

      assert.equal(response.status, 200);
      assert.equal(response.body.status, 'UP');
      assert.equal(response.body.configVersion, 'baseline-2025.1');
    });

    it('GET /api/v1/health is DOWN on an unusable override', async () => {
      await store.save({ leadTimeEnabled: { 7: false, 14: false, 21: false } }, 'test');

      const response = await request(app).get('/api/v1/health');

      assert.equal(response.status, 503);
      assert.equal(response.body.status, 'DOWN');
      assert.equal(response.body.reason, 'no lead time is enabled');
    });
  });
});
