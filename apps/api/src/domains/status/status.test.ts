import { describe, it, expect, beforeEach } from 'vitest';
import { StatusCategory } from '@tooth-ledger/shared/constants/status.constants.js';
import {
  createInMemoryLedger,
  silentLogger,
  type InMemoryLedger,
} from '../../../test/helpers/in-memory-ledger.js';
import {
  describeStatus,
  isBuiltInStatus,
  listActiveStatuses,
  listCustomStatuses,
  registerCustomStatus,
  resolveStatus,
  resolveStatusCodes,
  setCustomStatusActive,
  updateCustomStatus,
  type StatusServiceDeps,
} from './status.service.js';

let ledger: InMemoryLedger;
let deps: StatusServiceDeps;

beforeEach(() => {
  ledger = createInMemoryLedger();
  deps = { uow: ledger.uow, logger: silentLogger };
});

// ---------------------------------------------------------------------------
// resolve / describe
// ---------------------------------------------------------------------------

describe('resolveStatus', () => {
  it('resolves a built-in code case-insensitively', async () => {
    const status = await resolveStatus(deps, ' CARIES_DEEP ');

    expect(status).toEqual({
      code: 'caries_deep',
      displayName: 'Caries (Deep)',
      color: '#E74C3C',
      category: 'hard_tissue',
      builtIn: true,
      isActive: true,
    });
  });

  it('rejects an unknown code with UNKNOWN_STATUS', async () => {
    await expect(resolveStatus(deps, 'sparkly')).rejects.toMatchObject({
      statusCode: 400,
      code: 'UNKNOWN_STATUS',
    });
  });

  it('resolves an active custom status', async () => {
    await registerCustomStatus(deps, {
      code: 'sealant',
      displayName: 'Sealant',
      color: '#00ff00',
    });

    const status = await resolveStatus(deps, 'Sealant');
    expect(status.code).toBe('sealant');
    expect(status.builtIn).toBe(false);
    expect(status.category).toBe('other');
  });
});

describe('describeStatus', () => {
  it('falls back to the raw code in grey for unknown codes', async () => {
    const status = await describeStatus(deps, 'retired_code');

    expect(status).toEqual({
      code: 'retired_code',
      displayName: 'retired_code',
      color: '#808080',
      category: 'other',
      builtIn: false,
      isActive: false,
    });
  });

  it('still describes a deactivated custom status', async () => {
    await registerCustomStatus(deps, { code: 'sealant', displayName: 'Sealant', color: '#00FF00' });
    await setCustomStatusActive(deps, 'sealant', false);

    const status = await describeStatus(deps, 'sealant');
    expect(status.displayName).toBe('Sealant');
    expect(status.isActive).toBe(false);
  });
});

describe('isBuiltInStatus', () => {
  it('recognises built-ins regardless of case', () => {
    expect(isBuiltInStatus('Normal')).toBe(true);
    expect(isBuiltInStatus('sealant')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// resolveStatusCodes
// ---------------------------------------------------------------------------

describe('resolveStatusCodes', () => {
  it('normalises and de-duplicates, keeping first-seen order', async () => {
    const codes = await resolveStatusCodes(ledger.repos.statuses, [
      ' Caries_Deep ',
      'filling',
      'caries_deep',
    ]);
    expect(codes).toEqual(['caries_deep', 'filling']);
  });

  it('rejects an empty list', async () => {
    await expect(resolveStatusCodes(ledger.repos.statuses, [])).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'At least one status is required',
    });
  });

  it('rejects a blank code', async () => {
    await expect(resolveStatusCodes(ledger.repos.statuses, ['  '])).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Status codes must not be blank',
    });
  });

  it('rejects normal combined with another status', async () => {
    await expect(
      resolveStatusCodes(ledger.repos.statuses, ['normal', 'filling']),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('accepts normal on its own', async () => {
    await expect(resolveStatusCodes(ledger.repos.statuses, ['NORMAL'])).resolves.toEqual([
      'normal',
    ]);
  });

  it('rejects the whole list when one code is unknown', async () => {
    await expect(
      resolveStatusCodes(ledger.repos.statuses, ['filling', 'sparkly']),
    ).rejects.toMatchObject({ code: 'UNKNOWN_STATUS', details: { status: 'sparkly' } });
  });
});

// ---------------------------------------------------------------------------
// registerCustom
// ---------------------------------------------------------------------------

describe('registerCustomStatus', () => {
  it('stores the code lower-case and the colour upper-case', async () => {
    const status = await registerCustomStatus(deps, {
      code: 'Watch_Area',
      displayName: '  Watch area ',
      color: '#a1b2c3',
      category: StatusCategory.HARD_TISSUE,
    });

    expect(status).toEqual({
      code: 'watch_area',
      displayName: 'Watch area',
      color: '#A1B2C3',
      category: 'hard_tissue',
      builtIn: false,
      isActive: true,
    });
    expect(ledger.tables().customStatuses).toHaveLength(1);
  });

  it('rejects a code that collides with a built-in', async () => {
    await expect(
      registerCustomStatus(deps, { code: 'Caries_Deep', displayName: 'Mine', color: '#000000' }),
    ).rejects.toMatchObject({ statusCode: 409, code: 'DUPLICATE_STATUS' });
    expect(ledger.tables().customStatuses).toHaveLength(0);
  });

  it('rejects a code that collides with an existing custom status', async () => {
    await registerCustomStatus(deps, { code: 'sealant', displayName: 'Sealant', color: '#00FF00' });

    await expect(
      registerCustomStatus(deps, { code: 'SEALANT', displayName: 'Again', color: '#00FF00' }),
    ).rejects.toMatchObject({ code: 'DUPLICATE_STATUS' });
  });

  it('rejects a malformed code', async () => {
    await expect(
      registerCustomStatus(deps, { code: '9lives', displayName: 'Nine', color: '#000000' }),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', details: { field: 'code' } });
  });

  it('rejects a colour that is not #RRGGBB', async () => {
    await expect(
      registerCustomStatus(deps, { code: 'sealant', displayName: 'Sealant', color: 'green' }),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', details: { field: 'color' } });
  });
});

// ---------------------------------------------------------------------------
// updateCustom / setActive
// ---------------------------------------------------------------------------

describe('updateCustomStatus', () => {
  it('changes display fields of a custom status', async () => {
    await registerCustomStatus(deps, { code: 'sealant', displayName: 'Sealant', color: '#00FF00' });

    const updated = await updateCustomStatus(deps, 'sealant', {
      displayName: 'Fissure sealant',
      color: '#0000ff',
      category: StatusCategory.HARD_TISSUE,
    });

    expect(updated.displayName).toBe('Fissure sealant');
    expect(updated.color).toBe('#0000FF');
    expect(updated.category).toBe('hard_tissue');
  });

  it('refuses to modify a built-in', async () => {
    await expect(
      updateCustomStatus(deps, 'filling', { displayName: 'Amalgam' }),
    ).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Built-in statuses cannot be modified',
    });
  });

  it('returns NOT_FOUND for an unknown custom code', async () => {
    await expect(
      updateCustomStatus(deps, 'nothing_here', { displayName: 'x' }),
    ).rejects.toMatchObject({ statusCode: 404, code: 'NOT_FOUND' });
  });

  it('hides a deactivated status from resolve but keeps it listed as custom', async () => {
    await registerCustomStatus(deps, { code: 'sealant', displayName: 'Sealant', color: '#00FF00' });
    await setCustomStatusActive(deps, 'sealant', false);

    await expect(resolveStatus(deps, 'sealant')).rejects.toMatchObject({
      code: 'UNKNOWN_STATUS',
    });
    const customs = await listCustomStatuses(deps);
    expect(customs.map((s) => [s.code, s.isActive])).toEqual([['sealant', false]]);

    await setCustomStatusActive(deps, 'sealant', true);
    await expect(resolveStatus(deps, 'sealant')).resolves.toMatchObject({ isActive: true });
  });
});

// ---------------------------------------------------------------------------
// listActive
// ---------------------------------------------------------------------------

describe('listActiveStatuses', () => {
  it('groups every category in display order', async () => {
    const groups = await listActiveStatuses(deps);

    expect(groups.map((g) => g.category)).toEqual([
      'hard_tissue',
      'pulpal_periapical',
      'periodontal',
      'soft_tissue',
      'other',
    ]);
    expect(groups.map((g) => g.label)).toEqual([
      'Hard Tissue',
      'Pulpal / Periapical',
      'Periodontal',
      'Soft Tissue',
      'Other',
    ]);
    expect(groups[4].statuses.map((s) => s.code)).toEqual([
      'normal',
      'treatment_planned',
      'observation',
    ]);
  });

  it('appends active customs after the built-ins of their category, by name', async () => {
    await registerCustomStatus(deps, { code: 'zeta', displayName: 'Zeta', color: '#111111' });
    await registerCustomStatus(deps, { code: 'alpha', displayName: 'Alpha', color: '#222222' });
    await registerCustomStatus(deps, { code: 'hidden', displayName: 'Hidden', color: '#333333' });
    await setCustomStatusActive(deps, 'hidden', false);

    const groups = await listActiveStatuses(deps);
    const other = groups.find((g) => g.category === 'other');

    expect(other?.statuses.map((s) => s.code)).toEqual([
      'normal',
      'treatment_planned',
      'observation',
      'alpha',
      'zeta',
    ]);
  });
});
