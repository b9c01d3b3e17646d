import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { startLedgerApp, type LedgerApp } from '../../helpers/ledger-app.js';

let ctx: LedgerApp;

beforeEach(async () => {
  ctx = await startLedgerApp();
});

afterEach(async () => {
  await ctx.app.close();
});

async function registerSealant() {
  const res = await ctx.app.inject({
    method: 'POST',
    url: '/api/v1/statuses',
    payload: { code: 'Sealant', display_name: 'Sealant', color: '#00ff00' },
  });
  expect(res.statusCode).toBe(201);
  return res;
}

// ---------------------------------------------------------------------------
// Register / list
// ---------------------------------------------------------------------------

describe('status routes', () => {
  it('registers a custom status and rejects duplicates', async () => {
    const { app } = ctx;
    const created = await registerSealant();
    expect(created.json().data).toMatchObject({ code: 'sealant', color: '#00FF00', builtIn: false });

    const again = await app.inject({
      method: 'POST',
      url: '/api/v1/statuses',
      payload: { code: 'sealant', display_name: 'Again', color: '#00ff00' },
    });
    expect(again.statusCode).toBe(409);
    expect(again.json().error.code).toBe('DUPLICATE_STATUS');

    const builtIn = await app.inject({
      method: 'POST',
      url: '/api/v1/statuses',
      payload: { code: 'caries_deep', display_name: 'Mine', color: '#000000' },
    });
    expect(builtIn.statusCode).toBe(409);
  });

  it('rejects a malformed body with VALIDATION_ERROR', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/statuses',
      payload: { code: 'sealant', display_name: 'Sealant', color: 'green' },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });

  it('lists the five category groups', async () => {
    const res = await ctx.app.inject({ method: 'GET', url: '/api/v1/statuses' });
    expect(res.statusCode).toBe(200);
    expect(res.json().data).toHaveLength(5);
  });
});

// ---------------------------------------------------------------------------
// Resolve / describe
// ---------------------------------------------------------------------------

describe('GET /api/v1/statuses/:code', () => {
  it('returns UNKNOWN_STATUS for an unknown code', async () => {
    const res = await ctx.app.inject({ method: 'GET', url: '/api/v1/statuses/sparkly' });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: {
        code: 'UNKNOWN_STATUS',
        message: 'Unknown or inactive status: sparkly',
        details: { status: 'sparkly' },
      },
    });
  });

  it('describes an unknown code in the fallback colour when asked to', async () => {
    const res = await ctx.app.inject({
      method: 'GET',
      url: '/api/v1/statuses/sparkly?describe=true',
    });
    expect(res.statusCode).toBe(200);
    expect(res.json().data).toMatchObject({
      code: 'sparkly',
      displayName: 'sparkly',
      color: '#808080',
      builtIn: false,
      isActive: false,
    });
  });
});

// ---------------------------------------------------------------------------
// Activate / deactivate
// ---------------------------------------------------------------------------

describe('PUT /api/v1/statuses/:code/active', () => {
  it('hides a deactivated custom status from resolve but still describes it', async () => {
    const { app } = ctx;
    await registerSealant();

    const off = await app.inject({
      method: 'PUT',
      url: '/api/v1/statuses/sealant/active',
      payload: { is_active: false },
    });
    expect(off.statusCode).toBe(200);
    expect(off.json().data).toMatchObject({ code: 'sealant', isActive: false });

    const resolved = await app.inject({ method: 'GET', url: '/api/v1/statuses/sealant' });
    expect(resolved.statusCode).toBe(400);

    const described = await app.inject({
      method: 'GET',
      url: '/api/v1/statuses/sealant?describe=true',
    });
    expect(described.json().data).toMatchObject({ displayName: 'Sealant', isActive: false });

    const on = await app.inject({
      method: 'PUT',
      url: '/api/v1/statuses/sealant/active',
      payload: { is_active: true },
    });
    expect(on.json().data.isActive).toBe(true);
  });

  it('refuses to deactivate a built-in status', async () => {
    const res = await ctx.app.inject({
      method: 'PUT',
      url: '/api/v1/statuses/caries_deep/active',
      payload: { is_active: false },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.message).toBe('Built-in statuses cannot be modified');
  });
});
